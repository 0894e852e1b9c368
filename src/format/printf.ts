import type { Directive } from "./directives.js";

/**
 * Value as the configuration language prints it.
 */
export function stringify(value: unknown, nested = false): string {
    if (value === null || value === undefined) return "None";
    if (typeof value === "string") return nested ? JSON.stringify(value) : value;
    if (typeof value === "boolean") return value ? "True" : "False";
    if (typeof value === "number" || typeof value === "bigint") return String(value);
    if (Array.isArray(value)) {
        return `[${value.map((item) => stringify(item, true)).join(", ")}]`;
    }
    if (typeof value === "object") {
        const entries = Object.entries(value).map(([k, v]) => `${JSON.stringify(k)}: ${stringify(v, true)}`);
        return `{${entries.join(", ")}}`;
    }
    return String(value);
}

function justify(text: string, directive: Directive): string {
    const { width, flags } = directive;
    if (width === undefined || text.length >= width) return text;
    return flags.has("-") ? text.padEnd(width) : text.padStart(width);
}

function group(digits: string): string {
    return digits.replace(/\B(?=(\d{3})+(?!\d))/g, ",");
}

/**
 * Assemble sign, digits and padding for a numeric conversion.
 * `body` is the unsigned rendering; `negative` selects the sign.
 */
function signed(body: string, negative: boolean, directive: Directive): string {
    const { flags, width } = directive;
    let prefix = "";
    let suffix = "";
    if (negative) {
        if (flags.has("(")) {
            prefix = "(";
            suffix = ")";
        } else {
            prefix = "-";
        }
    } else if (flags.has("+")) {
        prefix = "+";
    } else if (flags.has(" ")) {
        prefix = " ";
    }

    if (flags.has("0") && width !== undefined) {
        body = body.padStart(width - prefix.length - suffix.length, "0");
    }
    return justify(prefix + body + suffix, directive);
}

function withGrouping(fixed: string, directive: Directive): string {
    if (!directive.flags.has(",")) return fixed;
    const [integer, fraction] = fixed.split(".");
    return fraction === undefined ? group(integer) : `${group(integer)}.${fraction}`;
}

function toBigInt(value: number | bigint): bigint {
    return typeof value === "bigint" ? value : BigInt(value);
}

function formatInteger(value: number | bigint, directive: Directive): string {
    const n = toBigInt(value);
    const negative = n < 0n;
    const digits = (negative ? -n : n).toString();
    return signed(withGrouping(digits, directive), negative, directive);
}

/**
 * Octal and hex render negative values as two's complement, 32 bits when the
 * value fits an int and 64 bits otherwise.
 */
function formatUnsigned(value: number | bigint, radix: 8 | 16, directive: Directive): string {
    let n = toBigInt(value);
    if (n < 0n) {
        n = n >= -(2n ** 31n) ? BigInt.asUintN(32, n) : BigInt.asUintN(64, n);
    }
    let digits = n.toString(radix);
    let prefix = "";
    if (directive.flags.has("#")) {
        prefix = radix === 16 ? "0x" : "0";
    }
    if (directive.flags.has("0") && directive.width !== undefined) {
        digits = digits.padStart(directive.width - prefix.length, "0");
    }
    const text = justify(prefix + digits, directive);
    return directive.conversion === "X" ? text.toUpperCase() : text;
}

/** Most digits toFixed and toExponential produce; longer precisions are zero padded */
const MAX_DIGITS = 100;

function toFixedDigits(magnitude: number, precision: number): string {
    // toFixed switches to exponent notation from 1e21 up; those values are integers
    if (magnitude >= 1e21) {
        const integer = BigInt(magnitude).toString();
        return precision > 0 ? `${integer}.${"0".repeat(precision)}` : integer;
    }
    if (precision > MAX_DIGITS) {
        return magnitude.toFixed(MAX_DIGITS) + "0".repeat(precision - MAX_DIGITS);
    }
    return magnitude.toFixed(precision);
}

function toExponentDigits(magnitude: number, precision: number): string {
    const computed = Math.min(precision, MAX_DIGITS);
    const [rounded, exponent] = magnitude.toExponential(computed).split("e");
    const mantissa = rounded + "0".repeat(precision - computed);
    const sign = exponent.startsWith("-") ? "-" : "+";
    const digits = exponent.replace(/^[-+]/, "").padStart(2, "0");
    return `${mantissa}e${sign}${digits}`;
}

function formatFloat(value: number | bigint, directive: Directive): string {
    const n = Number(value);
    const { conversion, flags } = directive;

    if (!Number.isFinite(n)) {
        const text = Number.isNaN(n) ? "NaN" : "Infinity";
        return signed(text, n < 0, { ...directive, flags: new Set([...flags].filter((f) => f !== "0")) });
    }

    const magnitude = Math.abs(n);
    const precision = directive.precision ?? 6;
    let body: string;

    switch (conversion) {
        case "f":
            body = withGrouping(toFixedDigits(magnitude, precision), directive);
            if (flags.has("#") && precision === 0) body += ".";
            break;
        case "e":
        case "E":
            body = toExponentDigits(magnitude, precision);
            if (flags.has("#") && precision === 0) body = body.replace("e", ".e");
            break;
        default: {
            // %g: plain decimal when the rounded value is in [1e-4, 10^precision)
            const significant = precision === 0 ? 1 : precision;
            if (magnitude === 0) {
                body = toFixedDigits(0, significant - 1);
                break;
            }
            const exponent = Number(magnitude.toExponential(Math.min(significant - 1, MAX_DIGITS)).split("e")[1]);
            body = exponent >= -4 && exponent < significant
                ? withGrouping(toFixedDigits(magnitude, significant - 1 - exponent), directive)
                : toExponentDigits(magnitude, significant - 1);
        }
    }

    const text = signed(body, n < 0 || Object.is(n, -0), directive);
    return conversion === "E" || conversion === "G" ? text.toUpperCase() : text;
}

function formatCharacter(value: unknown): string {
    return typeof value === "number" ? String.fromCodePoint(value) : String(value);
}

/**
 * Render one directive. The argument must already have passed `accepts`.
 */
export function renderDirective(directive: Directive, value: unknown): string {
    const { conversion, precision } = directive;
    switch (conversion) {
        case "%":
            return justify("%", directive);
        case "n":
            return "\n";
        case "s":
        case "S": {
            let text = stringify(value);
            if (precision !== undefined) text = [...text].slice(0, precision).join("");
            text = justify(text, directive);
            return conversion === "S" ? text.toUpperCase() : text;
        }
        case "b":
        case "B": {
            let text = value === null || value === undefined || value === false ? "false" : "true";
            if (precision !== undefined) text = text.slice(0, precision);
            text = justify(text, directive);
            return conversion === "B" ? text.toUpperCase() : text;
        }
        case "c":
        case "C": {
            const text = justify(formatCharacter(value), directive);
            return conversion === "C" ? text.toUpperCase() : text;
        }
        case "d":
        case "o":
        case "x":
        case "X":
        case "e":
        case "E":
        case "f":
        case "g":
        case "G": {
            if (typeof value !== "number" && typeof value !== "bigint") {
                throw new TypeError(`%${conversion} needs a number`);
            }
            if (conversion === "d") return formatInteger(value, directive);
            if (conversion === "o") return formatUnsigned(value, 8, directive);
            if (conversion === "x" || conversion === "X") return formatUnsigned(value, 16, directive);
            return formatFloat(value, directive);
        }
    }
}
