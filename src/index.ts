/**
 * Public entry point: board model, engines and the game driver.
 */

export * from './game/tictactoe'
export * from './ai/random'
export * from './ai/ai-engine'
export { bestMove, minimaxValue, MinimaxEngine, minimaxEngine } from './ai/engines/minimax-engine'
export {
  search,
  runSearch,
  calculateUCT,
  EXPLORATION_CONSTANT,
  MctsEngine,
  mctsEngine,
  type MCTSOptions,
  type MCTSSearchResult,
  type ChildStats,
} from './ai/engines/mcts-engine'
export { randomMove, RandomEngine, randomEngine } from './ai/engines/random-engine'
export {
  DIFFICULTY_CONFIGS,
  difficultyToEngineConfig,
  suggestMove,
  playComputerTurn,
  listEngines,
  type DifficultyLevel,
} from './ai/bot'
export {
  createBotPlayer,
  playBotMatch,
  runBotSeries,
  type MovePicker,
  type BotSpec,
  type BotMatchConfig,
  type SeriesResult,
} from './ai/botMatch'
export {
  moveSchema,
  moveHistorySchema,
  difficultySchema,
  engineConfigSchema,
  parseEngineConfig,
  safeParseMoves,
} from './lib/schemas'
export { getErrorMessage, isIllegalMoveError, logError } from './lib/errorUtils'
