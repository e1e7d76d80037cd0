/** Significant digits held by a BSON Decimal128. */
export const DECIMAL_PRECISION = 34;

/** `(-1)^negative * digits * 10^exponent`, `digits` without leading zeros. */
export type DecimalParts = {
    negative: boolean;
    digits: string;
    exponent: number;
};

const decimalPattern = /^([+-])?(\d*)(?:\.(\d*))?(?:[eE]([+-]?\d+))?$/;

/** Parse a decimal literal; returns undefined when it is not one. */
export function parseDecimal(text: string): DecimalParts | undefined {
    const match = decimalPattern.exec(text.trim());
    if (!match) return undefined;
    const intPart = match[2] ?? "";
    const fracPart = match[3] ?? "";
    if (intPart.length === 0 && fracPart.length === 0) return undefined;
    const exponent = Number(match[4] ?? "0") - fracPart.length;
    const digits = (intPart + fracPart).replace(/^0+(?=\d)/, "");
    return {
        negative: match[1] === "-" && /[1-9]/.test(digits),
        digits,
        exponent,
    };
}

function incrementDigits(digits: string): string {
    const out = digits.split("");
    let i = out.length - 1;
    while (i >= 0) {
        if (out[i] === "9") {
            out[i] = "0";
            i--;
            continue;
        }
        out[i] = String(Number(out[i]) + 1);
        return out.join("");
    }
    return "1" + out.join("");
}

/**
 * Round to `precision` significant digits using round-half-even.
 * Values already within precision are returned unchanged.
 */
export function roundDecimal(parts: DecimalParts, precision: number = DECIMAL_PRECISION): DecimalParts {
    if (parts.digits.length <= precision) return parts;
    const drop = parts.digits.length - precision;
    let kept = parts.digits.slice(0, precision);
    const rest = parts.digits.slice(precision);
    const first = Number(rest[0]);
    const tailNonZero = /[1-9]/.test(rest.slice(1));
    const lastKeptOdd = Number(kept[kept.length - 1]) % 2 === 1;
    const roundUp = first > 5 || (first === 5 && (tailNonZero || lastKeptOdd));
    let exponent = parts.exponent + drop;
    if (roundUp) {
        kept = incrementDigits(kept);
        if (kept.length > precision) {
            kept = kept.slice(0, precision);
            exponent += 1;
        }
    }
    return { negative: parts.negative, digits: kept, exponent };
}

/** Render parts as a literal accepted by `Decimal128.fromString`. */
export function formatDecimal(parts: DecimalParts): string {
    const sign = parts.negative ? "-" : "";
    if (parts.exponent > 0) {
        return `${sign}${parts.digits}E+${parts.exponent}`;
    }
    if (parts.exponent === 0) {
        return `${sign}${parts.digits}`;
    }
    const scale = -parts.exponent;
    const padded = parts.digits.padStart(scale + 1, "0");
    const intPart = padded.slice(0, padded.length - scale);
    const fracPart = padded.slice(padded.length - scale);
    return `${sign}${intPart}.${fracPart}`;
}

function isZero(parts: DecimalParts): boolean {
    return !/[1-9]/.test(parts.digits);
}

function compareMagnitude(a: DecimalParts, b: DecimalParts): number {
    const aDigits = a.digits.replace(/^0+/, "");
    const bDigits = b.digits.replace(/^0+/, "");
    const aAdjusted = a.exponent + aDigits.length - 1;
    const bAdjusted = b.exponent + bDigits.length - 1;
    if (aAdjusted !== bAdjusted) return aAdjusted > bAdjusted ? 1 : -1;
    const width = Math.max(aDigits.length, bDigits.length);
    const left = aDigits.padEnd(width, "0");
    const right = bDigits.padEnd(width, "0");
    if (left === right) return 0;
    return left > right ? 1 : -1;
}

/** Numeric comparison: negative, zero or positive like `Array.prototype.sort`. */
export function compareDecimal(a: DecimalParts, b: DecimalParts): number {
    const aZero = isZero(a);
    const bZero = isZero(b);
    if (aZero && bZero) return 0;
    if (aZero) return b.negative ? 1 : -1;
    if (bZero) return a.negative ? -1 : 1;
    if (a.negative !== b.negative) return a.negative ? -1 : 1;
    const magnitude = compareMagnitude(a, b);
    return a.negative ? -magnitude : magnitude;
}
