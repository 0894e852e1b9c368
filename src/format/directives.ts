import { FormatValidationError } from "../errors.js";

export type Conversion =
    | "s" | "S" | "b" | "B" | "c" | "C"
    | "d" | "o" | "x" | "X"
    | "e" | "E" | "f" | "g" | "G"
    | "%" | "n";

export type Flag = "-" | "#" | "+" | " " | "0" | "," | "(";

export interface Directive {
    /** Directive as written, e.g. "%-10s" */
    source: string;
    flags: ReadonlySet<Flag>;
    width?: number;
    precision?: number;
    conversion: Conversion;
}

export type Segment =
    | { kind: "literal"; text: string }
    | { kind: "directive"; directive: Directive };

/** Type names as the configuration language reports them */
export type ValueType = "string" | "int" | "float" | "bool" | "list" | "dict" | "NoneType" | "function";

const DIRECTIVE_PATTERN = /%([-#+ 0,(]*)(\d+)?(?:\.(\d+))?([a-zA-Z%])/y;

/** Flags each conversion takes besides "-" */
const ALLOWED_FLAGS: Record<Conversion, string> = {
    s: "", S: "", b: "", B: "", c: "", C: "",
    d: "+ 0,(",
    o: "#0", x: "#0", X: "#0",
    e: "#+ 0(", E: "#+ 0(",
    f: "#+ 0,(",
    g: "+ 0,(", G: "+ 0,(",
    "%": "", n: "",
};

const NO_PRECISION = new Set<Conversion>(["c", "C", "d", "o", "x", "X", "%", "n"]);

function isConversion(value: string): value is Conversion {
    return value in ALLOWED_FLAGS;
}

function isFlag(value: string): value is Flag {
    return "-#+ 0,(".includes(value);
}

/**
 * Whether a directive consumes an argument (%% and %n do not).
 */
export function takesArgument(directive: Directive): boolean {
    return directive.conversion !== "%" && directive.conversion !== "n";
}

function checkDirective(template: string, directive: Directive): void {
    const { source, flags, width, precision, conversion } = directive;
    const fail = (reason: string): never => {
        throw new FormatValidationError(template, "syntax", `malformed directive '${source}': ${reason}`);
    };

    if (conversion === "n" && (flags.size > 0 || width !== undefined)) {
        fail("%n takes no flags or width");
    }
    for (const flag of flags) {
        if (flag !== "-" && !ALLOWED_FLAGS[conversion].includes(flag)) {
            fail(`flag '${flag}' does not apply to %${conversion}`);
        }
    }
    if ((flags.has("-") || flags.has("0")) && width === undefined) {
        fail(`flag '${flags.has("-") ? "-" : "0"}' requires a width`);
    }
    if (flags.has("-") && flags.has("0")) {
        fail("flags '-' and '0' cannot be combined");
    }
    if (flags.has("+") && flags.has(" ")) {
        fail("flags '+' and ' ' cannot be combined");
    }
    if (precision !== undefined && NO_PRECISION.has(conversion)) {
        fail(`%${conversion} takes no precision`);
    }
}

/**
 * Split a template into literal text and directives, rejecting malformed ones.
 */
export function parseTemplate(template: string): Segment[] {
    const segments: Segment[] = [];
    let literal = "";
    let index = 0;

    while (index < template.length) {
        const char = template[index];
        if (char !== "%") {
            literal += char;
            index++;
            continue;
        }

        DIRECTIVE_PATTERN.lastIndex = index;
        const match = DIRECTIVE_PATTERN.exec(template);
        if (match === null) {
            throw new FormatValidationError(
                template,
                "syntax",
                `malformed directive at offset ${index}: '${template.slice(index)}'`,
            );
        }

        const [source, flagText, widthText, precisionText, conversion] = match;
        if (!isConversion(conversion)) {
            throw new FormatValidationError(template, "syntax", `unknown conversion '${conversion}' in '${source}'`);
        }

        const flags = new Set<Flag>();
        for (const flag of flagText) {
            if (isFlag(flag)) flags.add(flag);
        }

        const directive: Directive = {
            source,
            flags,
            width: widthText === undefined ? undefined : Number(widthText),
            precision: precisionText === undefined ? undefined : Number(precisionText),
            conversion,
        };
        checkDirective(template, directive);

        if (literal !== "") {
            segments.push({ kind: "literal", text: literal });
            literal = "";
        }
        segments.push({ kind: "directive", directive });
        index += source.length;
    }

    if (literal !== "") {
        segments.push({ kind: "literal", text: literal });
    }
    return segments;
}

/**
 * Type name of a runtime value, in the configuration language's terms.
 */
export function typeOf(value: unknown): ValueType {
    if (value === null || value === undefined) return "NoneType";
    if (Array.isArray(value)) return "list";
    switch (typeof value) {
        case "string":
            return "string";
        case "boolean":
            return "bool";
        case "bigint":
            return "int";
        case "number":
            return Number.isInteger(value) ? "int" : "float";
        case "function":
            return "function";
        default:
            return "dict";
    }
}

function isCharacter(value: unknown): boolean {
    if (typeof value === "string") {
        return [...value].length === 1;
    }
    if (typeof value === "number") {
        return Number.isInteger(value) && value >= 0 && value <= 0x10ffff;
    }
    return false;
}

/**
 * Whether `value` can be rendered by `conversion`.
 */
export function accepts(conversion: Conversion, value: unknown): boolean {
    switch (conversion) {
        case "s":
        case "S":
        case "b":
        case "B":
            return true;
        case "d":
        case "o":
        case "x":
        case "X":
            return typeOf(value) === "int";
        case "e":
        case "E":
        case "f":
        case "g":
        case "G": {
            const type = typeOf(value);
            return type === "int" || type === "float";
        }
        case "c":
        case "C":
            return isCharacter(value);
        case "%":
        case "n":
            return false;
    }
}
