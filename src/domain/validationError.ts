/**
 * Thrown by stores when a create/update payload breaks an entity rule.
 * `details` lists every problem found, not just the first.
 */
export class ValidationError extends Error {
  constructor(
    readonly entity: string,
    readonly details: string[]
  ) {
    super(`Invalid ${entity}: ${details.join("; ")}`);
    this.name = "ValidationError";
  }
}
