import { NameCollisionError } from './errors';

/**
 * Exported identifiers that collide with names the generated code declares itself.
 *
 * A method resolving to `constructor` could not be declared on the generated client class.
 */
export const DEFAULT_RESERVED_NAMES: ReadonlySet<string> = new Set(['Constructor']);

/**
 * Converts a schema name into an exported identifier, the way protobuf code generators do:
 * a leading `_` becomes `X`, an `_` before a lowercase letter is dropped, and every word starts uppercase.
 *
 * `foo_bar` -> `FooBar`, `foo_Bar` -> `Foo_Bar`, `_x` -> `XX`.
 */
export function camelCase(s: string): string {
  let result = '';
  let i = 0;

  if (s.startsWith('_')) {
    result += 'X';
    i++;
  }

  for (; i < s.length; i++) {
    const c = s[i];

    if (c === '_' && i + 1 < s.length && isLower(s[i + 1])) continue;

    if (isDigit(c)) {
      result += c;
      continue;
    }

    result += isLower(c) ? c.toUpperCase() : c;

    // Accept the lowercase run that follows.
    while (i + 1 < s.length && isLower(s[i + 1])) {
      i++;
      result += s[i];
    }
  }

  return result;
}

export function unexport(s: string): string {
  return s.slice(0, 1).toLowerCase() + s.slice(1);
}

export class NameResolver {
  readonly reserved: ReadonlySet<string>;

  constructor(reserved: Iterable<string> = DEFAULT_RESERVED_NAMES) {
    this.reserved = new Set(reserved);
  }

  resolve(rawName: string, exported: boolean): string {
    let name = camelCase(rawName);

    if (this.reserved.has(name)) {
      name += '_';
    }

    return exported ? name : unexport(name);
  }

  /** `demo.v1` -> `DemoV1` */
  packageIdentifier(packageName: string): string {
    return camelCase(packageName.replace(/\./g, '_'));
  }

  /**
   * Resolves every raw name in one scope and fails if two of them end up as the same identifier.
   */
  resolveAll(rawNames: readonly string[], exported: boolean, scope: string): string[] {
    const seen = new Map<string, string>();

    return rawNames.map((rawName) => {
      const identifier = this.resolve(rawName, exported);
      const previous = seen.get(identifier);

      if (previous !== undefined) {
        throw new NameCollisionError(identifier, scope, [previous, rawName]);
      }
      seen.set(identifier, rawName);

      return identifier;
    });
  }
}

function isLower(c: string): boolean {
  return c >= 'a' && c <= 'z';
}

function isDigit(c: string): boolean {
  return c >= '0' && c <= '9';
}
