/**
 * Tic-Tac-Toe Game Engine
 *
 * A pure TypeScript implementation of the 3x3 game rules.
 * This module contains no UI dependencies and is shared by the
 * search engines and the game driver.
 */

// Board dimensions
export const BOARD_SIZE = 3

// Player identifiers
export type Player = 'X' | 'O'
export type Cell = Player | null

// Board is represented as a 2D array: board[row][column]
export type Board = Cell[][]

/**
 * A cell coordinate. Always refers to an empty cell of the board it was
 * generated from.
 */
export interface Move {
  row: number
  col: number
}

// null while the game is still in progress
export type Outcome = Player | 'draw' | null

export interface GameState {
  board: Board
  currentPlayer: Player
  winner: Outcome
  moveHistory: Move[]
}

/**
 * Thrown when a move targets an occupied cell or a cell outside the grid.
 */
export class IllegalMoveError extends Error {
  readonly move: Move

  constructor(move: Move, reason = 'cell is not empty') {
    super(`Illegal move ${formatMove(move)}: ${reason}`)
    this.name = 'IllegalMoveError'
    this.move = move
  }
}

// Rows, then columns, then both diagonals
const WIN_LINES: ReadonlyArray<readonly [Move, Move, Move]> = [
  ...[0, 1, 2].map(
    (row): readonly [Move, Move, Move] => [
      { row, col: 0 },
      { row, col: 1 },
      { row, col: 2 },
    ]
  ),
  ...[0, 1, 2].map(
    (col): readonly [Move, Move, Move] => [
      { row: 0, col },
      { row: 1, col },
      { row: 2, col },
    ]
  ),
  [{ row: 0, col: 0 }, { row: 1, col: 1 }, { row: 2, col: 2 }],
  [{ row: 0, col: 2 }, { row: 1, col: 1 }, { row: 2, col: 0 }],
]

/**
 * Creates an empty game board.
 * All cells are initialized to null (empty).
 */
export function createEmptyBoard(): Board {
  return Array.from({ length: BOARD_SIZE }, () =>
    Array<Cell>(BOARD_SIZE).fill(null)
  )
}

/**
 * Creates a new game state with an empty board.
 * X always goes first.
 */
export function createGameState(): GameState {
  return {
    board: createEmptyBoard(),
    currentPlayer: 'X',
    winner: null,
    moveHistory: [],
  }
}

/**
 * Deep clones a board to avoid mutations.
 */
export function cloneBoard(board: Board): Board {
  return board.map((row) => [...row])
}

export function otherPlayer(player: Player): Player {
  return player === 'X' ? 'O' : 'X'
}

function isOnBoard(move: Move): boolean {
  return (
    Number.isInteger(move.row) &&
    Number.isInteger(move.col) &&
    move.row >= 0 &&
    move.row < BOARD_SIZE &&
    move.col >= 0 &&
    move.col < BOARD_SIZE
  )
}

/**
 * Checks if a move is valid (inside the grid and the cell is empty).
 */
export function isValidMove(board: Board, move: Move): boolean {
  return isOnBoard(move) && board[move.row][move.col] === null
}

/**
 * Returns every empty cell in row-major order.
 *
 * The order is relied on by Minimax tie-breaking and by MCTS expansion,
 * so it must stay row-major.
 */
export function legalMoves(board: Board): Move[] {
  const moves: Move[] = []
  for (let row = 0; row < BOARD_SIZE; row++) {
    for (let col = 0; col < BOARD_SIZE; col++) {
      if (board[row][col] === null) {
        moves.push({ row, col })
      }
    }
  }
  return moves
}

/**
 * Checks if the board is completely full.
 */
export function isBoardFull(board: Board): boolean {
  return legalMoves(board).length === 0
}

/**
 * Applies a move to the board, returning a new board state.
 * Does NOT mutate the original board.
 *
 * @throws IllegalMoveError if the cell is occupied or off the board
 */
export function applyMove(board: Board, move: Move, side: Player): Board {
  if (!isOnBoard(move)) {
    throw new IllegalMoveError(move, 'outside the board')
  }
  if (board[move.row][move.col] !== null) {
    throw new IllegalMoveError(move)
  }

  const newBoard = cloneBoard(board)
  newBoard[move.row][move.col] = side
  return newBoard
}

function findWinningLine(board: Board): readonly [Move, Move, Move] | null {
  for (const line of WIN_LINES) {
    const [a, b, c] = line
    const cell = board[a.row][a.col]
    if (
      cell !== null &&
      cell === board[b.row][b.col] &&
      cell === board[c.row][c.col]
    ) {
      return line
    }
  }
  return null
}

/**
 * Checks for a winner on the board.
 * Rows are checked first, then columns, then the two diagonals.
 *
 * @param board - The board to check
 * @returns The winning player, 'draw' if the board is full, or null if the game continues
 */
export function evaluateOutcome(board: Board): Outcome {
  const line = findWinningLine(board)
  if (line !== null) {
    return board[line[0].row][line[0].col]
  }

  if (isBoardFull(board)) {
    return 'draw'
  }

  return null
}

/**
 * Gets the winning cells (for highlighting).
 * Returns an array of [row, col] tuples, or null if no winner.
 */
export function getWinningCells(board: Board): [number, number][] | null {
  const line = findWinningLine(board)
  if (line === null) return null
  return line.map((cell): [number, number] => [cell.row, cell.col])
}

/**
 * Builds a board from three row strings.
 * 'X' and 'O' are pieces; a space or '.' is an empty cell.
 *
 * @example
 * boardFromRows(['XX ', 'OO ', '   '])
 */
export function boardFromRows(rows: readonly string[]): Board {
  if (rows.length !== BOARD_SIZE) {
    throw new Error(`Expected ${BOARD_SIZE} rows, got ${rows.length}`)
  }

  return rows.map((text, row) => {
    if (text.length !== BOARD_SIZE) {
      throw new Error(`Row ${row} must have ${BOARD_SIZE} cells: "${text}"`)
    }
    return Array.from(text, (char): Cell => {
      if (char === 'X' || char === 'O') return char
      if (char === ' ' || char === '.') return null
      throw new Error(`Unknown cell "${char}" in row ${row}`)
    })
  })
}

/**
 * Renders a board as three lines, '.' for empty cells. Used in log output.
 */
export function boardToDebugString(board: Board): string {
  return board.map((row) => row.map((cell) => cell ?? '.').join('')).join('\n')
}

/**
 * Formats a move the way players enter it: 1-based "(row,col)".
 */
export function formatMove(move: Move): string {
  return `(${move.row + 1},${move.col + 1})`
}

/**
 * Makes a move for the current player and returns the updated game state.
 * This is the main function for game play.
 *
 * @returns Updated game state, or null if the game is over or the move is invalid
 */
export function makeMove(state: GameState, move: Move): GameState | null {
  // Can't move if game is already over
  if (state.winner !== null) {
    return null
  }

  if (!isValidMove(state.board, move)) {
    return null
  }

  const board = applyMove(state.board, move, state.currentPlayer)
  const winner = evaluateOutcome(board)

  return {
    board,
    currentPlayer:
      winner === null ? otherPlayer(state.currentPlayer) : state.currentPlayer,
    winner,
    moveHistory: [...state.moveHistory, { row: move.row, col: move.col }],
  }
}

/**
 * Replays a game from a list of moves, X first.
 *
 * @returns The final game state, or null if any move is invalid
 */
export function replayMoves(moves: readonly Move[]): GameState | null {
  let state = createGameState()

  for (const move of moves) {
    const newState = makeMove(state, move)
    if (newState === null) {
      return null // Invalid move in sequence
    }
    state = newState
  }

  return state
}

/**
 * Gets the game state at a specific move index.
 *
 * @param moves - Full move history
 * @param moveIndex - Number of moves to replay (0 = empty board)
 * @returns Game state at that point, or null if invalid
 */
export function getStateAtMove(
  moves: readonly Move[],
  moveIndex: number
): GameState | null {
  if (moveIndex < 0 || moveIndex > moves.length) {
    return null
  }
  return replayMoves(moves.slice(0, moveIndex))
}

/**
 * Splits an alternating move history (X first) into each side's moves.
 */
export function getMovesByPlayer(
  moveHistory: readonly Move[]
): Record<Player, Move[]> {
  return {
    X: moveHistory.filter((_, index) => index % 2 === 0),
    O: moveHistory.filter((_, index) => index % 2 === 1),
  }
}
