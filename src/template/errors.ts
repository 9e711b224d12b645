/**
 * Template and binding errors
 */

export class TemplateSyntaxError extends Error {
  constructor(
    message: string,
    public readonly template: string,
    public readonly position: number
  ) {
    super(`${message} at position ${position} in "${template}"`);
    this.name = 'TemplateSyntaxError';
  }
}

/** A supplied value cannot be bound to a placeholder */
export class BindingError extends Error {
  constructor(message: string, public readonly field?: string) {
    super(message);
    this.name = 'BindingError';
  }
}
