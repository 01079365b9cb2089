/**
 * Structurally invalid input: an empty package name on a file with services, or a bad plugin option.
 *
 * Thrown before any file is generated, so a failing request produces no output at all.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Two schema names resolved to the same identifier within one scope: methods of a service, services of a package,
 * package identifiers, or the names of generated files.
 *
 * A plain hit on a reserved name is not an error; it is suffixed instead.
 */
export class NameCollisionError extends Error {
  constructor(
    readonly identifier: string,
    readonly scope: string,
    readonly rawNames: readonly [string, string],
  ) {
    super(`"${rawNames[0]}" and "${rawNames[1]}" both resolve to "${identifier}" in ${scope}`);
    this.name = 'NameCollisionError';
  }
}
