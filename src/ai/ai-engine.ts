/**
 * AI Engine Abstraction Layer
 *
 * Provides a pluggable interface for the computer-opponent strategies.
 * Engines use different decision-making approaches: uniform random play,
 * Monte Carlo Tree Search and exhaustive minimax.
 */

import type { Board, Move, Player } from '../game/tictactoe'

// ============================================================================
// CORE TYPES
// ============================================================================

/**
 * Configuration passed to engines for move selection.
 */
export interface EngineConfig {
  /** Simulation rounds for MCTS; ignored by engines that do not sample */
  iterations: number
  /** UCT exploration constant for MCTS */
  explorationConstant?: number
}

/**
 * Result returned from move selection.
 */
export interface MoveResult {
  /** Selected cell, or null when the board has no legal move */
  move: Move | null
  /** Confidence in the move (0-1), if available */
  confidence?: number
  /** Optional search statistics */
  searchInfo?: SearchInfo
}

/**
 * Search statistics for debugging and analysis.
 */
export interface SearchInfo {
  /** Number of positions evaluated */
  nodesSearched?: number
  /** Simulation rounds run (MCTS) */
  iterations?: number
  /** Game-theoretic score of the chosen move (minimax) */
  score?: number
  /** Time spent on move selection (ms) */
  timeUsed?: number
}

/**
 * Pluggable AI engine interface.
 *
 * Engines are stateless between calls. Each call blocks until a move is
 * chosen; there is no time budget or cancellation.
 */
export interface AIEngine {
  /** Unique engine identifier */
  readonly name: EngineType

  /** Human-readable description */
  readonly description: string

  /**
   * Select a move for the given position.
   *
   * @param board - Current board state (never mutated)
   * @param player - Player to move; engines play for this side
   * @param config - Engine configuration
   */
  selectMove(board: Board, player: Player, config: EngineConfig): MoveResult
}

// ============================================================================
// ENGINE REGISTRY
// ============================================================================

/**
 * Registry of the computer-opponent engines, keyed by engine type.
 */
export class EngineRegistry {
  private engines: Map<EngineType, AIEngine> = new Map()

  /**
   * Register an engine, replacing any engine of the same type.
   */
  register(engine: AIEngine): void {
    this.engines.set(engine.name, engine)
  }

  /**
   * Get an engine by type.
   *
   * @throws Error if no engine of that type is registered
   */
  get(name: EngineType): AIEngine {
    const engine = this.engines.get(name)
    if (!engine) {
      throw new Error(`Engine "${name}" not registered`)
    }
    return engine
  }

  /**
   * List all registered engines in registration order.
   */
  list(): Array<{ name: EngineType; description: string }> {
    return Array.from(this.engines.values()).map((engine) => ({
      name: engine.name,
      description: engine.description,
    }))
  }
}

// Global engine registry instance
export const engineRegistry = new EngineRegistry()

// ============================================================================
// ENGINE TYPE DEFINITIONS
// ============================================================================

/**
 * Supported engine types.
 */
export type EngineType =
  | 'random' // Uniform choice among legal moves
  | 'mcts' // Monte Carlo Tree Search with UCT selection
  | 'minimax' // Exhaustive minimax with alpha-beta pruning

/**
 * Default engine configurations by type.
 */
export const DEFAULT_ENGINE_CONFIGS: Record<EngineType, EngineConfig> = {
  random: { iterations: 0 },
  mcts: { iterations: 1000, explorationConstant: 1.414 },
  minimax: { iterations: 0 }, // Always searches the full tree
}
