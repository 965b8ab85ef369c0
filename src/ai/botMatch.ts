/**
 * Bot vs Bot Matches
 *
 * Plays complete games between two move pickers. Used to compare engines
 * and difficulty tiers against each other.
 */

import {
  type Board,
  type GameState,
  type Move,
  type Player,
  IllegalMoveError,
  makeMove,
  replayMoves,
} from '../game/tictactoe'
import type { EngineConfig } from './ai-engine'
import { engineRegistry } from './ai-engine'
import { type DifficultyLevel, difficultyToEngineConfig } from './bot'
import { engineConfigSchema, engineTypeSchema } from '../lib/schemas'
import { logError } from '../lib/errorUtils'
import './engines'

/**
 * Chooses a move for `player`, or null when it has none.
 */
export type MovePicker = (board: Board, player: Player) => Move | null

export type BotSpec =
  | { difficulty: DifficultyLevel }
  | { engine: string; config: EngineConfig }

export interface BotMatchConfig {
  x: MovePicker
  o: MovePicker
  /** Opening moves played before the pickers take over, X first */
  moves?: Move[]
}

export interface SeriesResult {
  xWins: number
  oWins: number
  draws: number
}

/**
 * Builds a move picker from a difficulty level or an explicit engine.
 *
 * @throws Error if the engine name is unknown
 */
export function createBotPlayer(spec: BotSpec): MovePicker {
  if ('difficulty' in spec) {
    const { engine, config } = difficultyToEngineConfig(spec.difficulty)
    return (board, player) => engine.selectMove(board, player, config).move
  }

  const engineName = engineTypeSchema.parse(spec.engine)
  const engine = engineRegistry.get(engineName)
  const config = engineConfigSchema.parse(spec.config)
  return (board, player) => engine.selectMove(board, player, config).move
}

function reportFailure(err: Error): Error {
  logError('botMatch', err)
  return err
}

/**
 * Plays one game to the end.
 *
 * @returns The final game state
 * @throws IllegalMoveError if a picker returns an unplayable move
 * @throws Error if a picker returns no move while the game is still live
 */
export function playBotMatch({ x, o, moves = [] }: BotMatchConfig): GameState {
  const opening = replayMoves(moves)
  if (opening === null) {
    throw new Error('Opening moves do not form a legal game')
  }

  let state = opening
  const pickers: Record<Player, MovePicker> = { X: x, O: o }

  while (state.winner === null) {
    const player = state.currentPlayer
    const move = pickers[player](state.board, player)

    if (move === null) {
      throw reportFailure(new Error(`${player} returned no move on a live board`))
    }
    const next = makeMove(state, move)
    if (next === null) {
      throw reportFailure(new IllegalMoveError(move, `${player} chose an unplayable cell`))
    }
    state = next
  }

  return state
}

/**
 * Plays `games` matches between the same pickers and tallies the results.
 */
export function runBotSeries(config: BotMatchConfig, games: number): SeriesResult {
  const result: SeriesResult = { xWins: 0, oWins: 0, draws: 0 }

  for (let game = 0; game < games; game++) {
    const final = playBotMatch(config)
    if (final.winner === 'X') result.xWins++
    else if (final.winner === 'O') result.oWins++
    else result.draws++
  }

  return result
}
