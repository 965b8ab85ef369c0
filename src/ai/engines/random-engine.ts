/**
 * Random Engine
 *
 * Baseline opponent: picks uniformly among the legal moves.
 */

import type { AIEngine, EngineConfig, MoveResult } from '../ai-engine'
import { type RandomSource, defaultRandom } from '../random'
import {
  type Board,
  type Move,
  type Player,
  evaluateOutcome,
  legalMoves,
} from '../../game/tictactoe'

/**
 * Legal moves open to the side to move; empty once the game is decided.
 */
function playableMoves(board: Board): Move[] {
  return evaluateOutcome(board) === null ? legalMoves(board) : []
}

function pick(moves: Move[], random: RandomSource): Move | null {
  if (moves.length === 0) return null
  return moves[random.nextInt(moves.length)]
}

/**
 * Uniformly random legal move.
 *
 * @returns null once the game is over
 */
export function randomMove(board: Board, random: RandomSource = defaultRandom): Move | null {
  return pick(playableMoves(board), random)
}

export class RandomEngine implements AIEngine {
  readonly name = 'random'
  readonly description = 'Uniform random choice among legal moves'

  constructor(private readonly random: RandomSource = defaultRandom) {}

  selectMove(board: Board, _player: Player, _config: EngineConfig): MoveResult {
    const moves = playableMoves(board)
    return {
      move: pick(moves, this.random),
      confidence: moves.length === 0 ? 0 : 1 / moves.length,
      searchInfo: { nodesSearched: 0 },
    }
  }
}

// Export singleton instance
export const randomEngine = new RandomEngine()
