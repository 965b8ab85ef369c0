/**
 * Computer Opponent
 *
 * Maps a difficulty level to one of the registered engines and plays the
 * computer's turn with it. The driver keeps the authoritative GameState and
 * calls into here once per computer turn.
 */

import {
  type Board,
  type GameState,
  type Player,
  boardToDebugString,
  formatMove,
  makeMove,
} from '../game/tictactoe'
import type { AIEngine, EngineConfig, EngineType, MoveResult } from './ai-engine'
import { engineRegistry } from './ai-engine'
import { engineConfigSchema } from '../lib/schemas'
// Import engines to register them
import './engines'

// ============================================================================
// TYPES
// ============================================================================

export type DifficultyLevel = 'beginner' | 'easy' | 'medium' | 'hard'

interface DifficultyConfig {
  engine: EngineType
  config: EngineConfig
}

/**
 * Change the iteration counts here to rebalance the MCTS tiers.
 */
export const DIFFICULTY_CONFIGS: Record<DifficultyLevel, DifficultyConfig> = {
  beginner: { engine: 'random', config: { iterations: 0 } },
  easy: { engine: 'mcts', config: { iterations: 200 } },
  medium: { engine: 'mcts', config: { iterations: 10_000 } },
  hard: { engine: 'minimax', config: { iterations: 0 } },
}

// ============================================================================
// ENGINE-BASED MOVE SUGGESTION
// ============================================================================

/**
 * Convert a difficulty level to its engine and validated configuration.
 */
export function difficultyToEngineConfig(difficulty: DifficultyLevel): {
  engine: AIEngine
  config: EngineConfig
} {
  const tier = DIFFICULTY_CONFIGS[difficulty]
  return {
    engine: engineRegistry.get(tier.engine),
    config: engineConfigSchema.parse(tier.config),
  }
}

/**
 * Suggest a move for `player` at the given difficulty.
 *
 * @returns The engine's move result; move is null on a full or decided board
 */
export function suggestMove(
  board: Board,
  player: Player,
  difficulty: DifficultyLevel
): MoveResult {
  const { engine, config } = difficultyToEngineConfig(difficulty)
  return engine.selectMove(board, player, config)
}

/**
 * Plays the computer's turn for the side to move.
 *
 * @returns The state after the move, or the same state when the game is
 * already over
 */
export function playComputerTurn(
  state: GameState,
  difficulty: DifficultyLevel
): GameState {
  if (state.winner !== null) {
    return state
  }

  const result = suggestMove(state.board, state.currentPlayer, difficulty)
  if (result.move === null) {
    console.warn(
      `[bot] ${difficulty} found no move for ${state.currentPlayer}:\n${boardToDebugString(state.board)}`
    )
    return state
  }

  const next = makeMove(state, result.move)
  if (next === null) {
    throw new Error(
      `Engine returned unplayable move ${formatMove(result.move)} at ${difficulty} difficulty`
    )
  }
  return next
}

/**
 * List the registered AI engines.
 */
export function listEngines() {
  return engineRegistry.list()
}

// Re-export types for convenience
export type { EngineConfig, MoveResult, AIEngine, EngineType }
