/**
 * Error Code Infrastructure
 * Stable error codes grouped by the stage that raises them.
 */

export enum ErrorCode {
  // Type description errors (E001–E099)
  NOT_A_RECORD_TYPE = 'E001',
  CIRCULAR_RECORD_TYPE = 'E002',

  // Generation errors (E100–E199)
  UNSUPPORTED_FIELD_TYPE = 'E100',
  RULE_FAILED = 'E101',
  DEPTH_LIMIT_EXCEEDED = 'E102',
  SEQUENCE_EXHAUSTED = 'E103',

  // Override errors (E200–E299)
  UNKNOWN_FIELD = 'E200',
  TYPE_MISMATCH = 'E201',

  // Configuration errors (E300–E399)
  CONFIGURATION_ERROR = 'E300',
}

export type ErrorStage = 'describe' | 'generate' | 'override' | 'config';

export const STAGE_BY_CODE = {
  [ErrorCode.NOT_A_RECORD_TYPE]: 'describe',
  [ErrorCode.CIRCULAR_RECORD_TYPE]: 'describe',
  [ErrorCode.UNSUPPORTED_FIELD_TYPE]: 'generate',
  [ErrorCode.RULE_FAILED]: 'generate',
  [ErrorCode.DEPTH_LIMIT_EXCEEDED]: 'generate',
  [ErrorCode.SEQUENCE_EXHAUSTED]: 'generate',
  [ErrorCode.UNKNOWN_FIELD]: 'override',
  [ErrorCode.TYPE_MISMATCH]: 'override',
  [ErrorCode.CONFIGURATION_ERROR]: 'config',
} satisfies Record<ErrorCode, ErrorStage>;

export function getErrorStage(code: ErrorCode): ErrorStage {
  return STAGE_BY_CODE[code];
}
