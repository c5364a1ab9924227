import { InputError } from '../core/errors.js';

export function readString(args: Record<string, unknown>, key: string): string | undefined {
  const value = args[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'string') {
    throw new InputError(`Argument "${key}" must be a string`, 'input_invalid');
  }
  return value;
}

export function requireString(args: Record<string, unknown>, key: string): string {
  const value = readString(args, key);
  if (value === undefined) {
    throw new InputError(`Argument "${key}" is required`);
  }
  return value;
}

export function readBoolean(args: Record<string, unknown>, key: string): boolean | undefined {
  const value = args[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'boolean') {
    throw new InputError(`Argument "${key}" must be a boolean`, 'input_invalid');
  }
  return value;
}

export function readNonNegativeInteger(args: Record<string, unknown>, key: string): number | undefined {
  const value = args[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
    throw new InputError(`Argument "${key}" must be a non-negative integer`, 'input_invalid');
  }
  return value;
}

export function readStringArray(args: Record<string, unknown>, key: string): string[] | undefined {
  const value = args[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (!Array.isArray(value)) {
    throw new InputError(`Argument "${key}" must be an array of strings`, 'input_invalid');
  }
  const items: string[] = [];
  for (const item of value) {
    if (typeof item !== 'string') {
      throw new InputError(`Argument "${key}" must be an array of strings`, 'input_invalid');
    }
    items.push(item);
  }
  return items;
}
