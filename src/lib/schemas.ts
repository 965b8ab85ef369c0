import { z } from 'zod'
import { BOARD_SIZE, type Move } from '../game/tictactoe'
import { DEFAULT_ENGINE_CONFIGS, type EngineConfig } from '../ai/ai-engine'

// Move schemas
export const moveSchema = z.object({
  row: z.number().int().min(0).max(BOARD_SIZE - 1),
  col: z.number().int().min(0).max(BOARD_SIZE - 1),
})

export const moveHistorySchema = z
  .array(moveSchema)
  .max(BOARD_SIZE * BOARD_SIZE, 'A game has at most 9 moves')

// Driver schemas
export const difficultySchema = z.enum(['beginner', 'easy', 'medium', 'hard'])

export const engineTypeSchema = z.enum(['random', 'mcts', 'minimax'])

// Engine configuration
export const engineConfigSchema = z.object({
  iterations: z
    .number()
    .int('Iterations must be a whole number')
    .min(0, 'Iterations cannot be negative'),
  explorationConstant: z
    .number()
    .positive('Exploration constant must be positive')
    .optional(),
})

export type EngineConfigInput = z.input<typeof engineConfigSchema>

/**
 * Validates an engine configuration, filling gaps from the MCTS defaults.
 *
 * @throws ZodError when a field is out of range
 */
export function parseEngineConfig(input: Partial<EngineConfigInput> = {}): EngineConfig {
  const defaults = DEFAULT_ENGINE_CONFIGS.mcts
  return engineConfigSchema.parse({
    iterations: input.iterations ?? defaults.iterations,
    explorationConstant: input.explorationConstant ?? defaults.explorationConstant,
  })
}

/**
 * Safely parse a stored move list (e.g. '[{"row":1,"col":1}]').
 * Returns an empty array if parsing or validation fails.
 */
export function safeParseMoves(movesJson: string | null | undefined): Move[] {
  if (!movesJson) {
    return []
  }

  let parsed: unknown
  try {
    parsed = JSON.parse(movesJson)
  } catch (error) {
    console.warn('safeParseMoves: failed to parse moves JSON:', error)
    return []
  }

  const result = moveHistorySchema.safeParse(parsed)
  if (!result.success) {
    console.warn('safeParseMoves: invalid move list:', result.error.issues[0]?.message)
    return []
  }
  return result.data
}
