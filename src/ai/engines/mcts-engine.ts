/**
 * MCTS Engine
 *
 * Monte Carlo Tree Search with UCT selection and uniformly random rollouts.
 *
 * UCT formula: UCT = W/N + C * sqrt(ln(N_parent) / N)
 * where:
 *   W = rollouts won by the root side through this node
 *   N = visit count of the node
 *   N_parent = visit count of the parent
 *   C = exploration constant (default: sqrt(2) ≈ 1.414)
 *
 * W is always counted for the side to move at the root, at every depth of
 * the tree. The tree lives in an arena indexed by node id and is dropped
 * when the search returns.
 */

import type { AIEngine, EngineConfig, MoveResult } from '../ai-engine'
import { type RandomSource, defaultRandom } from '../random'
import {
  type Board,
  type Move,
  type Outcome,
  type Player,
  applyMove,
  cloneBoard,
  evaluateOutcome,
  legalMoves,
  otherPlayer,
} from '../../game/tictactoe'

/** Exploration constant for UCT. sqrt(2) is standard. */
export const EXPLORATION_CONSTANT = 1.414

/** Rollout scores, from the root side's point of view */
export const ROLLOUT_WIN = 10
export const ROLLOUT_LOSS = -10
export const ROLLOUT_DRAW = 0

// ============================================================================
// TREE
// ============================================================================

type NodeId = number

/**
 * MCTS tree node.
 */
interface MCTSNode {
  board: Board
  playerToMove: Player
  /** Move that led here from the parent; null at the root */
  move: Move | null
  parent: NodeId | null
  children: NodeId[]
  untriedMoves: Move[]
  outcome: Outcome

  // Statistics
  visits: number
  wins: number
}

export interface MCTSOptions {
  random?: RandomSource
  explorationConstant?: number
}

export interface ChildStats {
  move: Move
  visits: number
  wins: number
}

export interface MCTSSearchResult {
  move: Move | null
  /** Root children in expansion order */
  children: ChildStats[]
  iterations: number
  nodesCreated: number
}

/**
 * UCB1 value of a child.
 * Unvisited children score Infinity so each one is tried before any
 * comparison between visited siblings.
 */
export function calculateUCT(
  wins: number,
  visits: number,
  parentVisits: number,
  explorationConstant = EXPLORATION_CONSTANT
): number {
  if (visits === 0) return Infinity
  const exploitation = wins / visits
  const exploration = explorationConstant * Math.sqrt(Math.log(parentVisits) / visits)
  return exploitation + exploration
}

/**
 * Single-use search tree. One instance per search() call.
 */
class SearchTree {
  private readonly nodes: MCTSNode[] = []
  private readonly rootPlayer: Player

  constructor(
    board: Board,
    playerToMove: Player,
    private readonly random: RandomSource,
    private readonly explorationConstant: number
  ) {
    this.rootPlayer = playerToMove
    this.createNode(cloneBoard(board), playerToMove, null, null)
  }

  get size(): number {
    return this.nodes.length
  }

  private createNode(
    board: Board,
    playerToMove: Player,
    move: Move | null,
    parent: NodeId | null
  ): NodeId {
    const outcome = evaluateOutcome(board)
    this.nodes.push({
      board,
      playerToMove,
      move,
      parent,
      children: [],
      untriedMoves: outcome === null ? legalMoves(board) : [],
      outcome,
      visits: 0,
      wins: 0,
    })
    return this.nodes.length - 1
  }

  private node(id: NodeId): MCTSNode {
    const node = this.nodes[id]
    if (node === undefined) {
      throw new Error(`MCTS node ${id} does not exist`)
    }
    return node
  }

  /**
   * Runs one selection / expansion / simulation / backpropagation round.
   */
  iterate(): void {
    // 1. Selection
    let id: NodeId = 0
    let node = this.node(id)
    while (
      node.untriedMoves.length === 0 &&
      node.children.length > 0 &&
      node.outcome === null
    ) {
      id = this.selectChild(node)
      node = this.node(id)
    }

    // 2. Expansion
    const move = node.outcome === null ? node.untriedMoves.pop() : undefined
    if (move !== undefined) {
      const childBoard = applyMove(node.board, move, node.playerToMove)
      const childId = this.createNode(
        childBoard,
        otherPlayer(node.playerToMove),
        move,
        id
      )
      node.children.push(childId)
      id = childId
      node = this.node(id)
    }

    // 3. Simulation
    const score =
      node.outcome === null
        ? this.rollout(node.board, node.playerToMove)
        : this.scoreOutcome(node.outcome)

    // 4. Backpropagation
    this.backpropagate(id, score)
  }

  private selectChild(node: MCTSNode): NodeId {
    let bestChild = node.children[0]
    let bestValue = -Infinity

    for (const childId of node.children) {
      const child = this.node(childId)
      const value = calculateUCT(
        child.wins,
        child.visits,
        node.visits,
        this.explorationConstant
      )
      // Strict comparison keeps the first child on ties
      if (value > bestValue) {
        bestValue = value
        bestChild = childId
      }
    }

    return bestChild
  }

  private rollout(board: Board, playerToMove: Player): number {
    const scratch = cloneBoard(board)
    let current = playerToMove

    for (;;) {
      const outcome = evaluateOutcome(scratch)
      if (outcome !== null) {
        return this.scoreOutcome(outcome)
      }

      const moves = legalMoves(scratch)
      const move = moves[this.random.nextInt(moves.length)]
      scratch[move.row][move.col] = current
      current = otherPlayer(current)
    }
  }

  private scoreOutcome(outcome: Player | 'draw'): number {
    if (outcome === 'draw') return ROLLOUT_DRAW
    return outcome === this.rootPlayer ? ROLLOUT_WIN : ROLLOUT_LOSS
  }

  private backpropagate(id: NodeId, score: number): void {
    // Losses and draws only add a visit
    const won = score === ROLLOUT_WIN ? 1 : 0
    let current: NodeId | null = id
    while (current !== null) {
      const node = this.node(current)
      node.visits++
      node.wins += won
      current = node.parent
    }
  }

  /**
   * Root child with the most visits; the first one wins ties.
   */
  mostVisitedMove(): Move | null {
    let bestMove: Move | null = null
    let maxVisits = -1

    for (const childId of this.node(0).children) {
      const child = this.node(childId)
      if (child.visits > maxVisits && child.move !== null) {
        maxVisits = child.visits
        bestMove = child.move
      }
    }

    return bestMove
  }

  rootChildren(): ChildStats[] {
    return this.node(0).children.flatMap((childId) => {
      const child = this.node(childId)
      return child.move === null
        ? []
        : [{ move: child.move, visits: child.visits, wins: child.wins }]
    })
  }
}

// ============================================================================
// SEARCH
// ============================================================================

/**
 * Runs MCTS and returns the chosen move with root statistics.
 *
 * @param iterations - Number of simulation rounds; must be a non-negative integer
 */
export function runSearch(
  board: Board,
  sideToMove: Player,
  iterations: number,
  options: MCTSOptions = {}
): MCTSSearchResult {
  if (!Number.isInteger(iterations) || iterations < 0) {
    throw new RangeError(
      `MCTS iterations must be a non-negative integer, got ${iterations}`
    )
  }

  const tree = new SearchTree(
    board,
    sideToMove,
    options.random ?? defaultRandom,
    options.explorationConstant ?? EXPLORATION_CONSTANT
  )

  for (let i = 0; i < iterations; i++) {
    tree.iterate()
  }

  return {
    move: tree.mostVisitedMove(),
    children: tree.rootChildren(),
    iterations,
    nodesCreated: tree.size,
  }
}

/**
 * Most-visited move after `iterations` MCTS rounds for `sideToMove`.
 *
 * @returns null when nothing was expanded: zero iterations, or no legal move
 */
export function search(
  board: Board,
  sideToMove: Player,
  iterations: number,
  options: MCTSOptions = {}
): Move | null {
  return runSearch(board, sideToMove, iterations, options).move
}

// ============================================================================
// MCTS ENGINE
// ============================================================================

/**
 * MCTS engine. config.iterations is the simulation budget per move.
 */
export class MctsEngine implements AIEngine {
  readonly name = 'mcts'
  readonly description = 'Monte Carlo Tree Search with UCT selection and random rollouts'

  constructor(private readonly random: RandomSource = defaultRandom) {}

  selectMove(board: Board, player: Player, config: EngineConfig): MoveResult {
    const startTime = Date.now()
    const result = runSearch(board, player, config.iterations, {
      random: this.random,
      explorationConstant: config.explorationConstant,
    })

    // Empirical win rate of the chosen child
    const chosen = result.children.find(
      (child) =>
        result.move !== null &&
        child.move.row === result.move.row &&
        child.move.col === result.move.col
    )
    const confidence =
      chosen === undefined || chosen.visits === 0 ? 0 : chosen.wins / chosen.visits

    return {
      move: result.move,
      confidence,
      searchInfo: {
        iterations: result.iterations,
        nodesSearched: result.nodesCreated,
        timeUsed: Date.now() - startTime,
      },
    }
  }
}

// Export singleton instance
export const mctsEngine = new MctsEngine()
