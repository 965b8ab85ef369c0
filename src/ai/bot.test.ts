import { describe, it, expect } from 'vitest'
import {
  DIFFICULTY_CONFIGS,
  difficultyToEngineConfig,
  listEngines,
  playComputerTurn,
  suggestMove,
} from './bot'
import { boardFromRows, legalMoves, replayMoves } from '../game/tictactoe'

describe('difficulty tiers', () => {
  it('maps each difficulty to its engine', () => {
    expect(difficultyToEngineConfig('beginner').engine.name).toBe('random')
    expect(difficultyToEngineConfig('easy').engine.name).toBe('mcts')
    expect(difficultyToEngineConfig('medium').engine.name).toBe('mcts')
    expect(difficultyToEngineConfig('hard').engine.name).toBe('minimax')
  })

  it('gives the MCTS tiers their simulation budgets', () => {
    expect(difficultyToEngineConfig('easy').config.iterations).toBe(200)
    expect(difficultyToEngineConfig('medium').config.iterations).toBe(10_000)
    expect(DIFFICULTY_CONFIGS.hard.engine).toBe('minimax')
  })
})

describe('suggestMove', () => {
  it('finds the winning move on hard', () => {
    const board = boardFromRows(['OO ', 'XX ', '   '])
    expect(suggestMove(board, 'O', 'hard').move).toEqual({ row: 0, col: 2 })
  })

  it('returns a legal move on beginner', () => {
    const board = boardFromRows(['XO.', 'OX.', '...'])
    const result = suggestMove(board, 'X', 'beginner')
    expect(legalMoves(board)).toContainEqual(result.move)
  })

  it('returns a null move on a full board', () => {
    expect(suggestMove(boardFromRows(['XOX', 'XOO', 'OXX']), 'X', 'hard').move).toBeNull()
  })

  it('returns a null move on a won board at every difficulty', () => {
    const board = boardFromRows(['XXX', 'OO.', '...'])
    for (const difficulty of ['beginner', 'easy', 'hard'] as const) {
      expect(suggestMove(board, 'O', difficulty).move).toBeNull()
    }
  })
})

describe('playComputerTurn', () => {
  it('plays for the side to move', () => {
    const state = replayMoves([
      { row: 1, col: 0 },
      { row: 0, col: 0 },
      { row: 1, col: 1 },
    ])
    expect(state).not.toBeNull()
    if (state) {
      const next = playComputerTurn(state, 'hard')
      // O must block the row
      expect(next.board[1][2]).toBe('O')
      expect(next.currentPlayer).toBe('X')
      expect(next.moveHistory).toHaveLength(4)
    }
  })

  it('leaves a finished game untouched', () => {
    const state = replayMoves([
      { row: 0, col: 0 },
      { row: 1, col: 0 },
      { row: 0, col: 1 },
      { row: 1, col: 1 },
      { row: 0, col: 2 },
    ])
    expect(state).not.toBeNull()
    if (state) {
      expect(playComputerTurn(state, 'hard')).toBe(state)
    }
  })
})

describe('listEngines', () => {
  it('lists the registered engines', () => {
    expect(listEngines().map((engine) => engine.name)).toEqual(['minimax', 'mcts', 'random'])
  })
})
