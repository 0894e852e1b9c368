import * as path from "node:path";
import { minimatch } from "minimatch";

/** Predicate over absolute paths. */
export type PathMatcher = (absolutePath: string) => boolean;

/**
 * Path of `candidate` relative to `root`, with "/" separators.
 * Throws if `candidate` lies outside `root`.
 */
export function relativeToRoot(root: string, candidate: string): string {
    const relative = path.relative(root, candidate);
    if (relative === ".." || relative.startsWith(`..${path.sep}`) || path.isAbsolute(relative)) {
        throw new Error(`Path '${candidate}' is not under '${root}'`);
    }
    return relative.split(path.sep).join("/");
}

/**
 * Whether `candidate`, taken relative to `root`, matches any of `patterns`.
 * An empty pattern list matches nothing.
 */
export function matches(root: string, candidate: string, patterns: readonly string[]): boolean {
    const relativePath = relativeToRoot(root, candidate);
    return patterns.some((pattern) => minimatch(relativePath, pattern, { dot: true }));
}

export function createPathMatcher(root: string, patterns: readonly string[]): PathMatcher {
    return (candidate) => matches(root, candidate, patterns);
}

export function notMatcher(matcher: PathMatcher): PathMatcher {
    return (candidate) => !matcher(candidate);
}
