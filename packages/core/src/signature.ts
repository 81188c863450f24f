/**
 * Call signature canonicalization
 */

import { ConfigurationError } from './errors.js';
import type { CanonicalStringable, FunctionDeclaration, ParameterDeclaration } from './types.js';

/** Files every entry may contain; output directories must not shadow them */
export const RESERVED_ENTRY_NAMES: readonly string[] = ['success_token', 'return_value.bin'];

const IDENTIFIER = /^[A-Za-z_$][A-Za-z0-9_$]*$/;

/** Separator between rendered parameters */
const PAIR_SEPARATOR = ';';

export function hasDefault(param: ParameterDeclaration): boolean {
  return Object.prototype.hasOwnProperty.call(param, 'default');
}

function isCanonicalStringable(value: object): value is CanonicalStringable {
  return 'toCanonicalString' in value && typeof value.toCanonicalString === 'function';
}

function isPlainObject(value: object): value is Record<string, unknown> {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function render(value: unknown, seen: Set<object>): string {
  switch (typeof value) {
    case 'string':
      return JSON.stringify(value);
    case 'number':
      // JSON has no NaN/Infinity and collapses -0
      if (Object.is(value, -0)) return '-0';
      return Number.isFinite(value) ? JSON.stringify(value) : String(value);
    case 'boolean':
      return value ? 'true' : 'false';
    case 'bigint':
      return `${value}n`;
    case 'undefined':
      return 'undefined';
  }

  if (typeof value !== 'object') {
    throw new ConfigurationError(`Values of type ${typeof value} have no canonical string form`);
  }
  if (value === null) return 'null';
  if (seen.has(value)) {
    throw new ConfigurationError('Cyclic values have no canonical string form');
  }

  if (isCanonicalStringable(value)) {
    // Tagged so a custom rendering never collides with a plain string
    return `<${value.toCanonicalString()}>`;
  }
  if (value instanceof Date) {
    return `Date(${value.toISOString()})`;
  }

  seen.add(value);
  try {
    if (Array.isArray(value)) {
      const items: unknown[] = value;
      return '[' + items.map((item) => render(item, seen)).join(',') + ']';
    }
    if (isPlainObject(value)) {
      const record = value;
      const keys = Object.keys(record).sort();
      const pairs = keys.map((k) => JSON.stringify(k) + ':' + render(record[k], seen));
      return '{' + pairs.join(',') + '}';
    }
  } finally {
    seen.delete(value);
  }

  const ctor: unknown = Object.getPrototypeOf(value)?.constructor;
  const typeName = typeof ctor === 'function' && ctor.name ? ctor.name : 'object';
  throw new ConfigurationError(
    `Values of type ${typeName} have no canonical string form; implement toCanonicalString()`
  );
}

/**
 * Deterministic, type-tagged string form of an argument value
 */
export function toCanonicalString(value: unknown): string {
  return render(value, new Set());
}

function escapeValue(rendered: string): string {
  return rendered.replace(/\\/g, '\\\\').replace(/;/g, '\\;');
}

function checkKnownNames(
  declaration: FunctionDeclaration,
  names: readonly string[] | undefined,
  option: string,
  declared: Set<string>
): void {
  for (const name of names ?? []) {
    if (!declared.has(name)) {
      throw new ConfigurationError(
        `${name} is not an argument to ${declaration.name}. Fix the arguments in \`${option}\`.`
      );
    }
  }
}

/**
 * Validate a function declaration. Runs once, when the cached function is created.
 */
export function validateDeclaration(declaration: FunctionDeclaration): void {
  const { name } = declaration;
  if (typeof name !== 'string' || !name.trim()) {
    throw new ConfigurationError('Cached function name must be a non-empty string');
  }
  if (name !== name.trim()) {
    throw new ConfigurationError(`Cached function name "${name}" must not have leading/trailing whitespace`);
  }
  if (name === '.' || name === '..' || name.startsWith('.')) {
    throw new ConfigurationError(`Cached function name "${name}" must not start with "."`);
  }
  if (name.includes('/') || name.includes('\\') || name.includes('\0')) {
    throw new ConfigurationError(`Cached function name "${name}" must not contain path separators`);
  }

  const declared = new Set<string>();
  const addName = (paramName: string, kind: string) => {
    if (!IDENTIFIER.test(paramName)) {
      throw new ConfigurationError(`${kind} "${paramName}" of ${name} is not a valid identifier`);
    }
    if (declared.has(paramName)) {
      throw new ConfigurationError(`${kind} "${paramName}" of ${name} is declared twice`);
    }
    declared.add(paramName);
  };

  for (const param of declaration.parameters) {
    addName(param.name, 'Parameter');
    if (hasDefault(param)) {
      try {
        toCanonicalString(param.default);
      } catch (err) {
        if (err instanceof ConfigurationError) {
          throw new ConfigurationError(`Default of ${name}.${param.name}: ${err.message}`);
        }
        throw err;
      }
    }
  }
  for (const dir of declaration.outputDirs ?? []) {
    addName(dir, 'Output directory');
    if (RESERVED_ENTRY_NAMES.includes(dir)) {
      throw new ConfigurationError(`Output directory "${dir}" of ${name} collides with a reserved entry file`);
    }
  }

  checkKnownNames(declaration, declaration.exclude, 'exclude', declared);
  checkKnownNames(declaration, declaration.excludeIfDefault, 'excludeIfDefault', declared);

  for (const paramName of declaration.excludeIfDefault ?? []) {
    const param = declaration.parameters.find((p) => p.name === paramName);
    if (!param || !hasDefault(param)) {
      throw new ConfigurationError(
        `${paramName} has no default in ${name}, so it cannot be listed in \`excludeIfDefault\`.`
      );
    }
  }
}

/**
 * Bind caller arguments to the declaration, applying defaults
 */
export function bindArguments<TArgs extends Record<string, unknown>>(
  declaration: FunctionDeclaration,
  args: TArgs
): TArgs {
  const outputDirs = new Set(declaration.outputDirs ?? []);
  const paramNames = new Set(declaration.parameters.map((p) => p.name));

  for (const key of Object.keys(args)) {
    if (outputDirs.has(key)) {
      throw new ConfigurationError(
        `${key} is an output directory of ${declaration.name}; its path is provided by the cache`
      );
    }
    if (!paramNames.has(key)) {
      throw new ConfigurationError(`${key} is not an argument to ${declaration.name}`);
    }
  }

  const bound: TArgs = { ...args };
  for (const param of declaration.parameters) {
    if (Object.prototype.hasOwnProperty.call(args, param.name)) continue;
    if (!hasDefault(param)) {
      throw new ConfigurationError(`Missing required argument ${param.name} to ${declaration.name}`);
    }
    Object.assign(bound, { [param.name]: param.default });
  }
  return bound;
}

/**
 * Canonical signature of one bound call.
 * Output directories and excluded parameters never contribute.
 */
export function canonicalizeSignature(
  declaration: FunctionDeclaration,
  boundArgs: Record<string, unknown>
): string {
  const outputDirs = new Set(declaration.outputDirs ?? []);
  const exclude = new Set(declaration.exclude ?? []);
  const excludeIfDefault = new Set(declaration.excludeIfDefault ?? []);

  const pairs: string[] = [];
  for (const param of declaration.parameters) {
    if (outputDirs.has(param.name) || exclude.has(param.name)) continue;

    let rendered: string;
    try {
      rendered = toCanonicalString(boundArgs[param.name]);
    } catch (err) {
      if (err instanceof ConfigurationError) {
        throw new ConfigurationError(`Argument ${declaration.name}.${param.name}: ${err.message}`);
      }
      throw err;
    }

    if (
      excludeIfDefault.has(param.name) &&
      hasDefault(param) &&
      rendered === toCanonicalString(param.default)
    ) {
      continue;
    }
    pairs.push(`${param.name}=${escapeValue(rendered)}`);
  }
  return pairs.join(PAIR_SEPARATOR);
}
