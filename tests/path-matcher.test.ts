import { describe, it, expect } from "vitest";
import * as path from "node:path";
import { matches, createPathMatcher, notMatcher, relativeToRoot } from "../src/folder/path-matcher.js";

const root = path.resolve("/work/dest");

describe("Path matcher", () => {
    it("should match paths relative to the root", () => {
        expect(matches(root, path.join(root, "keep", "a.txt"), ["keep/**"])).toBe(true);
        expect(matches(root, path.join(root, "other", "a.txt"), ["keep/**"])).toBe(false);
    });

    it("should OR patterns together", () => {
        const patterns = ["*.md", "config/*.json"];
        expect(matches(root, path.join(root, "README.md"), patterns)).toBe(true);
        expect(matches(root, path.join(root, "config", "app.json"), patterns)).toBe(true);
        expect(matches(root, path.join(root, "src", "app.json"), patterns)).toBe(false);
    });

    it("should match nothing with no patterns", () => {
        expect(matches(root, path.join(root, "anything"), [])).toBe(false);
    });

    it("should match dotfiles", () => {
        expect(matches(root, path.join(root, ".git", "HEAD"), [".git/**"])).toBe(true);
    });

    it("should reject a candidate outside the root", () => {
        expect(() => matches(root, path.resolve("/work/other/file"), ["**"])).toThrow("is not under");
    });

    it("should treat names starting with two dots as inside the root", () => {
        expect(relativeToRoot(root, path.join(root, "..hidden"))).toBe("..hidden");
    });

    it("should negate a matcher", () => {
        const keep = createPathMatcher(root, ["keep.txt"]);
        const remove = notMatcher(keep);
        expect(remove(path.join(root, "keep.txt"))).toBe(false);
        expect(remove(path.join(root, "drop.txt"))).toBe(true);
    });
});
