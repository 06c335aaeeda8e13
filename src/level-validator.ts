import { JsonErrc } from './errors.js';
import { err, ok } from './result.js';
import { ParserState, type ParserResult } from './types.js';

/**
 * Tracks whether a single-level parser is inside its container.
 */
export class LevelValidator {
  private entered = false;

  get isEntered(): boolean {
    return this.entered;
  }

  enter(): ParserResult {
    if (this.entered) return err(JsonErrc.UserValidationFailed, 'Did not expect nested elements');
    this.entered = true;
    return ok(ParserState.Running);
  }

  leave(): ParserResult {
    if (!this.entered) return err(JsonErrc.UserValidationFailed, 'Cannot leave level');
    this.entered = false;
    return ok(ParserState.Finished);
  }
}
