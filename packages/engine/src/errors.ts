/**
 * Errors raised by the profile engine.
 *
 * Only broken collaborator contracts and bad configuration are errors; empty
 * terrain, cancelled builds and degenerate routes are ordinary results.
 */

/** A collaborator handed the engine data it promised not to (bad waypoint, bad viewport) */
export class ProfileContractError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ProfileContractError";
  }
}

/** A configuration value is missing or out of range */
export class ProfileConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ProfileConfigError";
  }
}
