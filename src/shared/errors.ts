/**
 * Error types surfaced to CLI users.
 */

export class SlashkitError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SlashkitError';
  }
}

export class NotFoundError extends SlashkitError {
  constructor(
    public readonly kind: string,
    public readonly lookup: string,
  ) {
    super(`No ${kind} named "${lookup}" was found`);
    this.name = 'NotFoundError';
  }
}

export class TemplateExistsError extends SlashkitError {
  constructor(public readonly path: string) {
    super(`Refusing to overwrite ${path} (use --force to replace it)`);
    this.name = 'TemplateExistsError';
  }
}

export class ConfigError extends SlashkitError {
  constructor(
    public readonly path: string,
    detail: string,
  ) {
    super(`Invalid configuration in ${path}: ${detail}`);
    this.name = 'ConfigError';
  }
}

/**
 * Message text of an unknown thrown value
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
