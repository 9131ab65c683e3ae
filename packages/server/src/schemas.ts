/** Technology names and rule ids end up as directory and file names */
export const PATH_SEGMENT_PATTERN = '^[A-Za-z0-9][A-Za-z0-9_.+-]*$'

const optionalSegment = {
  type: 'string',
  nullable: true,
  pattern: '^([A-Za-z0-9][A-Za-z0-9_.+-]*)?$',
} as const

export const technologyParamsSchema = {
  type: 'object',
  required: ['technology'],
  properties: {
    technology: { type: 'string', pattern: PATH_SEGMENT_PATTERN },
  },
} as const

export const ruleParamsSchema = {
  type: 'object',
  required: ['technology', 'ruleId'],
  properties: {
    technology: { type: 'string', pattern: PATH_SEGMENT_PATTERN },
    ruleId: { type: 'string', pattern: PATH_SEGMENT_PATTERN },
  },
} as const

export const fileContextSchema = {
  type: 'object',
  required: ['file_path'],
  properties: {
    file_path: { type: 'string' },
    /** Extension lookup key only; never becomes a path */
    file_type: { type: 'string', nullable: true },
    project_type: optionalSegment,
    additional_context: { type: 'object', nullable: true },
  },
} as const

export const deployRequestSchema = {
  type: 'object',
  required: ['target_dir'],
  properties: {
    target_dir: { type: 'string', minLength: 1 },
    technology: optionalSegment,
  },
} as const

export interface TechnologyParams {
  technology: string
}

export interface RuleParams {
  technology: string
  ruleId: string
}

export interface DeployRequest {
  target_dir: string
  technology?: string | null
}
