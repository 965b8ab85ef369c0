import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { createBotPlayer, playBotMatch, runBotSeries, type MovePicker } from './botMatch'
import { MctsEngine } from './engines/mcts-engine'
import { RandomEngine } from './engines/random-engine'
import { bestMove } from './engines/minimax-engine'
import { createSeededRandom } from './random'
import { IllegalMoveError, legalMoves, type Move } from '../game/tictactoe'
import { isIllegalMoveError } from '../lib/errorUtils'

const minimaxPicker: MovePicker = (board, player) => bestMove(board, player)

const firstEmpty: MovePicker = (board) => legalMoves(board)[0] ?? null

describe('playBotMatch', () => {
  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => {})
  })

  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('plays minimax against itself to a draw', () => {
    const final = playBotMatch({ x: minimaxPicker, o: minimaxPicker })
    expect(final.winner).toBe('draw')
    expect(final.moveHistory).toHaveLength(9)
  })

  it('fills cells in order when both sides take the first empty cell', () => {
    // X takes (0,0), (0,2), (1,1), (2,0) and wins on the anti-diagonal
    const final = playBotMatch({ x: firstEmpty, o: firstEmpty })
    expect(final.winner).toBe('X')
    expect(final.moveHistory).toHaveLength(7)
  })

  it('continues from opening moves', () => {
    const opening: Move[] = [
      { row: 0, col: 0 },
      { row: 1, col: 0 },
      { row: 0, col: 1 },
      { row: 1, col: 1 },
    ]
    const final = playBotMatch({ x: minimaxPicker, o: minimaxPicker, moves: opening })
    expect(final.winner).toBe('X')
    expect(final.moveHistory[4]).toEqual({ row: 0, col: 2 })
  })

  it('returns a finished opening without asking the pickers', () => {
    const picker = vi.fn<MovePicker>(() => null)
    const final = playBotMatch({
      x: picker,
      o: picker,
      moves: [
        { row: 0, col: 0 },
        { row: 1, col: 0 },
        { row: 0, col: 1 },
        { row: 1, col: 1 },
        { row: 0, col: 2 },
      ],
    })
    expect(final.winner).toBe('X')
    expect(picker).not.toHaveBeenCalled()
  })

  it('rejects an illegal opening', () => {
    expect(() =>
      playBotMatch({
        x: minimaxPicker,
        o: minimaxPicker,
        moves: [
          { row: 0, col: 0 },
          { row: 0, col: 0 },
        ],
      })
    ).toThrow('Opening moves do not form a legal game')
  })

  it('throws and logs when a picker returns no move', () => {
    expect(() => playBotMatch({ x: () => null, o: minimaxPicker })).toThrow(
      'X returned no move on a live board'
    )
    expect(console.error).toHaveBeenCalledTimes(1)
  })

  it('throws IllegalMoveError when a picker chooses an occupied cell', () => {
    const stubborn: MovePicker = () => ({ row: 1, col: 1 })
    let caught: unknown
    try {
      playBotMatch({ x: stubborn, o: stubborn })
    } catch (err) {
      caught = err
    }
    expect(caught).toBeInstanceOf(IllegalMoveError)
    expect(isIllegalMoveError(caught)).toBe(true)
    if (isIllegalMoveError(caught)) {
      expect(caught.message).toBe('Illegal move (2,2): O chose an unplayable cell')
    }
  })
})

describe('createBotPlayer', () => {
  it('builds a picker from a difficulty', () => {
    const hard = createBotPlayer({ difficulty: 'hard' })
    const final = playBotMatch({ x: hard, o: hard })
    expect(final.winner).toBe('draw')
  })

  it('builds a picker from an engine name and config', () => {
    const picker = createBotPlayer({ engine: 'minimax', config: { iterations: 0 } })
    expect(picker([['X', 'X', null], ['O', 'O', null], [null, null, null]], 'X')).toEqual({
      row: 0,
      col: 2,
    })
  })

  it('rejects an unknown engine', () => {
    expect(() => createBotPlayer({ engine: 'alphazero', config: { iterations: 0 } })).toThrow()
  })

  it('rejects a negative iteration count', () => {
    expect(() => createBotPlayer({ engine: 'mcts', config: { iterations: -5 } })).toThrow(
      'Iterations cannot be negative'
    )
  })
})

describe('runBotSeries', () => {
  it('tallies results', () => {
    expect(runBotSeries({ x: minimaxPicker, o: minimaxPicker }, 3)).toEqual({
      xWins: 0,
      oWins: 0,
      draws: 3,
    })
  })

  it('minimax never loses to random play', () => {
    const random = new RandomEngine(createSeededRandom(77))
    const randomPicker: MovePicker = (board, player) =>
      random.selectMove(board, player, { iterations: 0 }).move

    const asX = runBotSeries({ x: minimaxPicker, o: randomPicker }, 15)
    const asO = runBotSeries({ x: randomPicker, o: minimaxPicker }, 15)

    expect(asX.oWins).toBe(0)
    expect(asO.xWins).toBe(0)
  })

  it('counts every game once with a seeded MCTS opponent', () => {
    const mcts = new MctsEngine(createSeededRandom(5))
    const mctsPicker: MovePicker = (board, player) =>
      mcts.selectMove(board, player, { iterations: 200 }).move

    const result = runBotSeries({ x: mctsPicker, o: minimaxPicker }, 4)
    expect(result.xWins + result.oWins + result.draws).toBe(4)
    expect(result.xWins).toBe(0)
  })
})
