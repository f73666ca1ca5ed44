import { CommandOption, CommandOptionValue } from './interfaces/interaction.interface';

export class CommandOptionError extends Error {}

/** Typed access to a command's options by name. */
export class CommandOptions {
  private readonly values = new Map<string, CommandOptionValue | undefined>();

  constructor(options: readonly CommandOption[] = []) {
    for (const option of options) {
      this.values.set(option.name, option.value);
    }
  }

  string(name: string): string {
    const value = this.values.get(name);
    if (typeof value !== 'string' || value.trim() === '') {
      throw new CommandOptionError(`Missing or invalid option: ${name}`);
    }
    return value.trim();
  }

  number(name: string): number {
    const value = this.values.get(name);
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      throw new CommandOptionError(`Missing or invalid option: ${name}`);
    }
    return value;
  }

  integer(name: string, fallback: number): number {
    if (this.values.get(name) === undefined) return fallback;
    const value = this.number(name);
    if (!Number.isInteger(value)) {
      throw new CommandOptionError(`Option ${name} must be a whole number`);
    }
    return value;
  }
}
