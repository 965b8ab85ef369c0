/**
 * Minimax Engine
 *
 * Exhaustive minimax with alpha-beta pruning. The 3x3 tree is small enough
 * to search to the end of the game, so every move it returns is
 * game-theoretically optimal for the side to move.
 */

import type { AIEngine, EngineConfig, MoveResult } from '../ai-engine'
import {
  type Board,
  type Move,
  type Player,
  BOARD_SIZE,
  cloneBoard,
  evaluateOutcome,
  legalMoves,
  otherPlayer,
} from '../../game/tictactoe'

// ============================================================================
// SCORES
// ============================================================================

/**
 * Terminal scores. Not discounted by depth, so a quick win and a slow win
 * score the same.
 */
export const WIN_SCORE = 10
export const LOSS_SCORE = -10
export const DRAW_SCORE = 0

export type MinimaxScore = typeof WIN_SCORE | typeof LOSS_SCORE | typeof DRAW_SCORE

// ============================================================================
// MINIMAX SEARCH
// ============================================================================

interface SearchCounter {
  nodesSearched: number
}

function search(
  board: Board,
  maximizer: Player,
  maximizingTurn: boolean,
  alpha: number,
  beta: number,
  counter: SearchCounter
): MinimaxScore {
  counter.nodesSearched++

  const outcome = evaluateOutcome(board)
  if (outcome !== null) {
    if (outcome === 'draw') return DRAW_SCORE
    return outcome === maximizer ? WIN_SCORE : LOSS_SCORE
  }

  const mover = maximizingTurn ? maximizer : otherPlayer(maximizer)

  if (maximizingTurn) {
    let bestScore = -Infinity
    for (let row = 0; row < BOARD_SIZE; row++) {
      for (let col = 0; col < BOARD_SIZE; col++) {
        if (board[row][col] !== null) continue

        board[row][col] = mover
        const score = search(board, maximizer, false, alpha, beta, counter)
        board[row][col] = null

        bestScore = Math.max(bestScore, score)
        alpha = Math.max(alpha, score)
        if (beta <= alpha) return toScore(bestScore)
      }
    }
    return toScore(bestScore)
  } else {
    let bestScore = Infinity
    for (let row = 0; row < BOARD_SIZE; row++) {
      for (let col = 0; col < BOARD_SIZE; col++) {
        if (board[row][col] !== null) continue

        board[row][col] = mover
        const score = search(board, maximizer, true, alpha, beta, counter)
        board[row][col] = null

        bestScore = Math.min(bestScore, score)
        beta = Math.min(beta, score)
        if (beta <= alpha) return toScore(bestScore)
      }
    }
    return toScore(bestScore)
  }
}

// A live board always has an empty cell, so the loops above assign bestScore
function toScore(value: number): MinimaxScore {
  if (value === WIN_SCORE || value === LOSS_SCORE || value === DRAW_SCORE) {
    return value
  }
  throw new Error(`Minimax produced an out-of-range score: ${value}`)
}

/**
 * Game-theoretic value of a position for `maximizer`.
 *
 * Searches in place on a private copy, so `board` is left untouched.
 *
 * @param maximizingTurn - true when `maximizer` is the side to move
 */
export function minimaxValue(
  board: Board,
  maximizer: Player,
  maximizingTurn: boolean,
  alpha = -Infinity,
  beta = Infinity
): MinimaxScore {
  return search(cloneBoard(board), maximizer, maximizingTurn, alpha, beta, {
    nodesSearched: 0,
  })
}

interface BestMoveResult {
  move: Move | null
  score: MinimaxScore | null
  nodesSearched: number
}

function findBestMove(board: Board, sideToMove: Player): BestMoveResult {
  const counter: SearchCounter = { nodesSearched: 0 }

  if (evaluateOutcome(board) !== null) {
    return { move: null, score: null, nodesSearched: 0 }
  }

  const scratch = cloneBoard(board)
  let bestMove: Move | null = null
  let bestScore = -Infinity

  for (const move of legalMoves(scratch)) {
    scratch[move.row][move.col] = sideToMove
    const score = search(scratch, sideToMove, false, -Infinity, Infinity, counter)
    scratch[move.row][move.col] = null

    // Strictly greater: the first move in row-major order keeps ties
    if (score > bestScore) {
      bestScore = score
      bestMove = move
    }
  }

  return {
    move: bestMove,
    score: bestMove === null ? null : toScore(bestScore),
    nodesSearched: counter.nodesSearched,
  }
}

/**
 * Optimal move for `sideToMove`, which plays as the maximizing side.
 *
 * @returns The first highest-scoring move in row-major order, or null when
 * the board is full or already decided
 */
export function bestMove(board: Board, sideToMove: Player): Move | null {
  return findBestMove(board, sideToMove).move
}

// ============================================================================
// MINIMAX ENGINE
// ============================================================================

/**
 * Minimax engine with alpha-beta pruning, searching to the end of the game.
 */
export class MinimaxEngine implements AIEngine {
  readonly name = 'minimax'
  readonly description = 'Exhaustive minimax search with alpha-beta pruning'

  selectMove(board: Board, player: Player, _config: EngineConfig): MoveResult {
    const startTime = Date.now()
    const result = findBestMove(board, player)

    // Map -10..10 onto 0..1
    const confidence =
      result.score === null ? 0 : (result.score - LOSS_SCORE) / (WIN_SCORE - LOSS_SCORE)

    return {
      move: result.move,
      confidence,
      searchInfo: {
        nodesSearched: result.nodesSearched,
        score: result.score ?? undefined,
        timeUsed: Date.now() - startTime,
      },
    }
  }
}

// Export singleton instance
export const minimaxEngine = new MinimaxEngine()
