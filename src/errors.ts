/** A style color that is not a 6-digit hex value reached the color table. */
export class InvalidColorFormatError extends Error {
  readonly color: string;
  readonly category?: string;

  constructor(color: string, category?: string) {
    super(
      category
        ? `Invalid color "${color}" in style for ${category}. Expected 6 hex digits`
        : `Invalid color "${color}". Expected 6 hex digits`
    );
    this.name = 'InvalidColorFormatError';
    this.color = color;
    this.category = category;
  }
}

/**
 * The renderer asked for a color the color table never saw.
 * Only reachable when a style source enumerates different styles than it resolves.
 */
export class UnknownColorReferenceError extends Error {
  readonly color: string;

  constructor(color: string) {
    super(`Color "${color}" is not in the color table`);
    this.name = 'UnknownColorReferenceError';
    this.color = color;
  }
}

export class OptionError extends Error {
  readonly option: string;

  constructor(option: string, message: string) {
    super(message);
    this.name = 'OptionError';
    this.option = option;
  }
}
