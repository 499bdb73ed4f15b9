/**
 * Configuration utility functions
 */

/**
 * Type-safe environment variable getter with automatic type inference
 * @param name Environment variable name
 * @param defaultValue Value used when the variable is not set; its type selects the conversion
 * @returns Environment variable value converted to the type of defaultValue
 * @throws {Error} if conversion fails
 */
export function env<T extends string | number | boolean>(name: string, defaultValue: T): Widen<T>;
export function env(name: string, defaultValue: string | number | boolean): string | number | boolean {
  const value = process.env[name];

  if (value === undefined) {
    return defaultValue;
  }

  // Type-safe conversion based on default value type
  if (typeof defaultValue === "number") {
    const numValue = Number(value);
    if (value.trim() === "" || isNaN(numValue)) {
      throw new Error(`Environment variable ${name} must be a valid number, got: ${value}`);
    }
    return numValue;
  }

  if (typeof defaultValue === "boolean") {
    if (value === "true" || value === "1") {
      return true;
    }
    if (value === "false" || value === "0") {
      return false;
    }
    throw new Error(
      `Environment variable ${name} must be a valid boolean (true/false/1/0), got: ${value}`,
    );
  }

  return value;
}

type Widen<T> = T extends string ? string : T extends number ? number : T extends boolean ? boolean : never;

/**
 * Splits a whitespace-separated argument list, e.g. "-k -h"
 */
export function parseArgList(value: string): readonly string[] {
  return value.split(/\s+/).filter((s) => s.length > 0);
}

/**
 * Splits a colon-separated path list, e.g. "/etc/a.ini:/etc/b.ini"
 */
export function parsePathList(value: string): readonly string[] {
  return value.split(":").map((s) => s.trim()).filter((s) => s.length > 0);
}

/**
 * Environment variable restricted to a fixed set of values
 * @throws {Error} if the variable is set to a value outside the set
 */
export function envOneOf<const T extends readonly string[]>(
  name: string,
  allowed: T,
  defaultValue: T[number],
): T[number] {
  const value = process.env[name];
  if (value === undefined) {
    return defaultValue;
  }
  const match = allowed.find((candidate) => candidate === value);
  if (match === undefined) {
    throw new Error(
      `Environment variable ${name} must be one of ${allowed.join(", ")}, got: ${value}`,
    );
  }
  return match;
}
