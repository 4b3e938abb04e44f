export class Validator {
  /**
   * Parse a 1-based menu answer. Returns null for empty, non-numeric or out-of-range input.
   */
  static parseChoice(input: string | undefined, max: number): number | null {
    const trimmed = (input ?? '').trim();
    if (!/^\d+$/.test(trimmed)) {
      return null;
    }

    const choice = Number.parseInt(trimmed, 10);
    if (choice < 1 || choice > max) {
      return null;
    }

    return choice;
  }

  /**
   * Trim a typed or pasted directory path, dropping surrounding quotes
   */
  static normalizeDirectoryInput(input: string | undefined): string {
    return (input ?? '').trim().replace(/^["']+|["']+$/g, '').trim();
  }

  /**
   * Case-insensitive comparison used for reserved directory names
   */
  static equalsIgnoreCase(a: string, b: string): boolean {
    return a.toLowerCase() === b.toLowerCase();
  }
}
