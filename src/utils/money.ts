/**
 * Fixed-point money helpers.
 *
 * Amounts are held as integer minor units with two decimal places.
 * "100.50" → 10050, 10050 → "100.50", -5025 → "-50.25".
 * No floating-point arithmetic is performed on amounts.
 */

export const MONEY_DECIMALS = 2;

const DECIMAL_PATTERN = /^-?\d+(\.\d+)?$/;

export class InvalidMoneyError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidMoneyError';
  }
}

/**
 * Parse a decimal string (or a finite number) into minor units.
 */
export function toMinorUnits(value: string | number): number {
  const text = typeof value === 'number' ? numberToPlainString(value) : value.trim();

  if (!DECIMAL_PATTERN.test(text)) {
    throw new InvalidMoneyError(`Invalid amount format: "${text}"`);
  }

  const negative = text.startsWith('-');
  const abs = negative ? text.slice(1) : text;
  const [intPart = '0', fracPart = ''] = abs.split('.');

  if (fracPart.length > MONEY_DECIMALS) {
    throw new InvalidMoneyError(`Amount "${text}" has more than ${MONEY_DECIMALS} decimal places`);
  }

  const minor = Number(intPart + fracPart.padEnd(MONEY_DECIMALS, '0'));
  if (!Number.isSafeInteger(minor)) {
    throw new InvalidMoneyError(`Amount "${text}" is out of range`);
  }

  return negative && minor !== 0 ? -minor : minor;
}

/**
 * Format minor units as a decimal string with exactly two decimals.
 */
export function formatMinorUnits(minor: number): string {
  if (!Number.isSafeInteger(minor)) {
    throw new InvalidMoneyError(`Minor units must be a safe integer, got ${minor}`);
  }

  const negative = minor < 0;
  const digits = Math.abs(minor).toString().padStart(MONEY_DECIMALS + 1, '0');
  const intPart = digits.slice(0, digits.length - MONEY_DECIMALS);
  const fracPart = digits.slice(digits.length - MONEY_DECIMALS);

  return `${negative ? '-' : ''}${intPart}.${fracPart}`;
}

/**
 * Numbers arriving from JSON bodies are rendered without exponent notation so
 * 0.1 stays "0.1" and 1e21 is rejected by the pattern check.
 */
function numberToPlainString(value: number): string {
  if (!Number.isFinite(value)) {
    throw new InvalidMoneyError(`Amount must be finite, got ${value}`);
  }
  return String(value);
}
