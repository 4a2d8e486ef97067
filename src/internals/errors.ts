/**
 * Thrown when a grammar breaks one of the engine's structural invariants.
 * Ordinary syntax errors are never thrown, see ParseError.
 */

export class GrammarError extends Error {
  readonly rule: string;

  constructor(rule: string, message: string) {
    super(`Rule "${rule}": ${message}`);
    this.name = "GrammarError";
    this.rule = rule;
  }
}
