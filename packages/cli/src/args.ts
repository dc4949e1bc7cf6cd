/**
 * Argument helpers shared by the command modules
 */

import type { Metadata } from '@cloud-agents/core';

export class CliUsageError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'CliUsageError';
  }
}

/**
 * Value following `name`, or undefined when the option is absent.
 */
export function getOption(args: string[], name: string): string | undefined {
  const idx = args.indexOf(name);
  if (idx < 0) {
    return undefined;
  }
  const value = args[idx + 1];
  if (value === undefined || value.startsWith('--')) {
    throw new CliUsageError(`${name} requires a value`);
  }
  return value;
}

/**
 * Every value given for a repeatable option, in order.
 */
export function getOptions(args: string[], name: string): string[] {
  const values: string[] = [];
  for (let i = 0; i < args.length; i++) {
    if (args[i] !== name) continue;
    const value = args[i + 1];
    if (value === undefined || value.startsWith('--')) {
      throw new CliUsageError(`${name} requires a value`);
    }
    values.push(value);
    i++;
  }
  return values;
}

export function hasFlag(args: string[], name: string): boolean {
  return args.includes(name);
}

export function getNumberOption(args: string[], name: string): number | undefined {
  const raw = getOption(args, name);
  if (raw === undefined) {
    return undefined;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new CliUsageError(`${name} must be a positive integer, got '${raw}'`);
  }
  return value;
}

/**
 * Arguments that are neither flags nor option values. `valueOptions` names the
 * options that consume the next argument.
 */
export function positionals(args: string[], valueOptions: string[] = []): string[] {
  const result: string[] = [];
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (valueOptions.includes(arg)) {
      i++;
    } else if (!arg.startsWith('--')) {
      result.push(arg);
    }
  }
  return result;
}

export function requireArg(value: string | undefined, usage: string): string {
  if (!value) {
    throw new CliUsageError(`Usage: cloud-agents ${usage}`);
  }
  return value;
}

/**
 * Parse `--meta key=value` pairs into metadata.
 */
export function parseMetadata(pairs: string[]): Metadata | undefined {
  if (pairs.length === 0) {
    return undefined;
  }
  const metadata: Metadata = {};
  for (const pair of pairs) {
    const eq = pair.indexOf('=');
    if (eq <= 0) {
      throw new CliUsageError(`Invalid --meta value '${pair}', expected key=value`);
    }
    metadata[pair.slice(0, eq)] = pair.slice(eq + 1);
  }
  return metadata;
}
