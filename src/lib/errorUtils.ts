/**
 * Error handling utilities
 *
 * Provides consistent error message extraction and logging across the engines
 * and the game driver.
 */

import { IllegalMoveError } from '../game/tictactoe'

/**
 * Extract a readable error message from an unknown error value.
 * Handles Error objects, strings, and objects with a message property.
 *
 * @param err - The error to extract a message from
 * @param fallback - Fallback message if no message can be extracted
 *
 * @example
 * try {
 *   applyMove(board, move, 'X')
 * } catch (err) {
 *   console.warn(getErrorMessage(err))
 * }
 */
export function getErrorMessage(err: unknown, fallback = 'An error occurred'): string {
  if (err instanceof Error) {
    return err.message
  }

  if (typeof err === 'string') {
    return err
  }

  if (err && typeof err === 'object' && 'message' in err && typeof err.message === 'string') {
    return err.message
  }

  return fallback
}

/**
 * Check if an error was raised for a move into an occupied or off-board cell.
 */
export function isIllegalMoveError(err: unknown): err is IllegalMoveError {
  return err instanceof IllegalMoveError
}

/**
 * Log an error with context for debugging.
 *
 * @param context - A description of where/what the error occurred
 * @param err - The error to log
 */
export function logError(context: string, err: unknown): void {
  const message = getErrorMessage(err)
  console.error(`[${context}]`, message, err)
}
