export { format, validateFormat, type FormatResult } from "./validator.js";
export {
    parseTemplate,
    typeOf,
    accepts,
    takesArgument,
    type Conversion,
    type Directive,
    type Flag,
    type Segment,
    type ValueType,
} from "./directives.js";
export { renderDirective, stringify } from "./printf.js";
