/**
 * AI Engines Index
 *
 * Registers the AI engines with the global registry.
 * Import this module to ensure engines are registered before use.
 */

import { engineRegistry } from '../ai-engine'
import { minimaxEngine } from './minimax-engine'
import { mctsEngine } from './mcts-engine'
import { randomEngine } from './random-engine'

// Register all engines
engineRegistry.register(minimaxEngine)
engineRegistry.register(mctsEngine)
engineRegistry.register(randomEngine)

// Re-export engines for direct access if needed
export { minimaxEngine, mctsEngine, randomEngine }

// Re-export registry utilities
export { engineRegistry }
