import { HttpStatus } from "@nestjs/common"
import { PipelineException } from "./pipeline.exception"

// The parts of a class-validator ValidationError read here
export interface ConstraintViolation {
  property: string
  constraints?: Record<string, string>
  children?: ConstraintViolation[]
}

function collectMessages(errors: ConstraintViolation[], parentPath?: string): string[] {
  return errors.flatMap((error) => {
    const path = parentPath ? `${parentPath}.${error.property}` : error.property
    const own = Object.values(error.constraints ?? {}).map((constraint) => `${path}: ${constraint}`)
    return [...own, ...collectMessages(error.children ?? [], path)]
  })
}

/**
 * Request body rejected by the validation pipe; one message per failed
 * constraint, prefixed with the property path
 */
export class ValidationException extends PipelineException {
  constructor(messages: string[]) {
    super(messages, HttpStatus.BAD_REQUEST, "ValidationError")
  }

  static fromValidationErrors(errors: ConstraintViolation[]): ValidationException {
    return new ValidationException(collectMessages(errors))
  }
}
