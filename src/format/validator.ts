import { FormatValidationError } from "../errors.js";
import { accepts, parseTemplate, takesArgument, typeOf, type Directive } from "./directives.js";
import { renderDirective } from "./printf.js";

export type FormatResult =
    | { ok: true; value: string }
    | { ok: false; error: FormatValidationError };

function plural(count: number): string {
    return count === 1 ? "argument" : "arguments";
}

/**
 * Check `args` against the directives of `template` and, only if every check
 * passes, format them. Failures come back as values; nothing is thrown.
 *
 * @example
 * validateFormat("%-10s %d", ["foo", 1234]) // { ok: true, value: "foo        1234" }
 * validateFormat("%-10s %d", ["foo", "1234"]) // error "Invalid format: %-10s %d: d != string"
 */
export function validateFormat(template: string, args: readonly unknown[]): FormatResult {
    try {
        return { ok: true, value: format(template, args) };
    } catch (err) {
        if (err instanceof FormatValidationError) {
            return { ok: false, error: err };
        }
        throw err;
    }
}

/**
 * Same checks as `validateFormat`, throwing the FormatValidationError.
 */
export function format(template: string, args: readonly unknown[]): string {
    const segments = parseTemplate(template);

    const directives: Directive[] = [];
    for (const segment of segments) {
        if (segment.kind === "directive" && takesArgument(segment.directive)) {
            directives.push(segment.directive);
        }
    }

    if (directives.length !== args.length) {
        throw new FormatValidationError(
            template,
            "arity",
            `expected ${directives.length} ${plural(directives.length)}, got ${args.length}`,
        );
    }

    directives.forEach((directive, i) => {
        if (!accepts(directive.conversion, args[i])) {
            throw new FormatValidationError(template, "type", `${directive.conversion} != ${typeOf(args[i])}`);
        }
    });

    let position = 0;
    return segments
        .map((segment) => {
            if (segment.kind === "literal") return segment.text;
            if (!takesArgument(segment.directive)) return renderDirective(segment.directive, undefined);
            return renderDirective(segment.directive, args[position++]);
        })
        .join("");
}
