import { ValidationError } from '../errors/tool-error.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Typed read access to parameters that already passed validation.
 */
export class ToolArgs {
  private readonly values: Readonly<Record<string, unknown>>;

  public constructor(values: unknown) {
    this.values = isRecord(values) ? values : {};
  }

  public has(name: string): boolean {
    return this.values[name] !== undefined;
  }

  public string(name: string): string {
    const value = this.optionalString(name);
    if (value === undefined) {
      throw mismatch(name, 'string');
    }
    return value;
  }

  public optionalString(name: string): string | undefined {
    const value = this.values[name];
    if (value === undefined) return undefined;
    if (typeof value !== 'string') throw mismatch(name, 'string');
    return value;
  }

  public integer(name: string): number {
    const value = this.optionalInteger(name);
    if (value === undefined) {
      throw mismatch(name, 'integer');
    }
    return value;
  }

  public optionalInteger(name: string): number | undefined {
    const value = this.values[name];
    if (value === undefined) return undefined;
    if (typeof value !== 'number' || !Number.isInteger(value)) throw mismatch(name, 'integer');
    return value;
  }

  public boolean(name: string): boolean {
    const value = this.values[name];
    if (typeof value !== 'boolean') throw mismatch(name, 'boolean');
    return value;
  }

  public stringArray(name: string): string[] {
    const value = this.values[name];
    if (!Array.isArray(value)) throw mismatch(name, 'array');
    return value.map((entry, index) => {
      if (typeof entry !== 'string') throw mismatch(`${name}.${index}`, 'string');
      return entry;
    });
  }

  public records(name: string): ToolArgs[] {
    const value = this.values[name];
    if (!Array.isArray(value)) throw mismatch(name, 'array');
    return value.map((entry) => new ToolArgs(entry));
  }

  public toJSON(): Record<string, unknown> {
    return { ...this.values };
  }
}

function mismatch(name: string, expected: string): ValidationError {
  return ValidationError.invalidParams([
    { path: name.split('.'), message: `Expected ${expected}` },
  ]);
}
