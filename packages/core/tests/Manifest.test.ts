import {
    canonicalManifest,
    parseManifest,
    toDependencies,
} from "../src/manifest/Manifest";
import { DependencyResolutionError } from "../src/utils/err";

describe("Manifest", () => {
    test("parses entries in order with their line numbers", () => {
        const manifest = parseManifest(
            "# web\nexpress==4.18.2\n\n@types/node@^20  # types\nleft-pad\n",
        );

        expect(manifest).toEqual([
            { name: "express", constraint: "4.18.2", line: 2 },
            { name: "@types/node", constraint: "^20", line: 4 },
            { name: "left-pad", constraint: "*", line: 5 },
        ]);
    });

    test("translates comparison operators to npm ranges", () => {
        const manifest = parseManifest(
            "a>=1.2\nb<=2\nc>1.0.0\nd<3\ne~=1.4\nf == 2.0.0\ng@latest",
        );

        expect(manifest.map((e) => e.constraint)).toEqual([
            ">=1.2",
            "<=2",
            ">1.0.0",
            "<3",
            ">=1.4 <2.0.0",
            "2.0.0",
            "latest",
        ]);
    });

    test("a compatible release stays below the next release of its prefix", () => {
        const manifest = parseManifest("a~=2.2\nb~=1.4.5\nc ~= 0.9.1");

        expect(manifest.map((e) => e.constraint)).toEqual([
            ">=2.2 <3.0.0",
            ">=1.4.5 <1.5.0",
            ">=0.9.1 <0.10.0",
        ]);
    });

    test("a compatible release needs at least two numeric components", () => {
        expect(() => parseManifest("a~=1")).toThrow(
            "Unsupported version constraint: 'a~=1' (manifest line 1)",
        );
        expect(() => parseManifest("a~=1.x")).toThrow(
            "Unsupported version constraint: 'a~=1.x' (manifest line 1)",
        );
    });

    test("a tilde never becomes part of the package name", () => {
        expect(parseManifest("left-pad~=1.3")).toEqual([
            { name: "left-pad", constraint: ">=1.3 <2.0.0", line: 1 },
        ]);
        expect(() => parseManifest("left~pad==1.0.0")).toThrow(
            "Invalid manifest entry: 'left~pad==1.0.0' (manifest line 1)",
        );
    });

    test("accepts CRLF line endings", () => {
        const manifest = parseManifest("a==1.0.0\r\nb==2.0.0\r\n");
        expect(manifest.map((e) => e.name)).toEqual(["a", "b"]);
    });

    test("rejects a missing version after an operator", () => {
        expect(() => parseManifest("express==")).toThrow(
            "Missing version after operator: 'express==' (manifest line 1)",
        );
    });

    test("rejects text that is not an entry", () => {
        expect(() => parseManifest("ok==1.0.0\nexpress 4.18.2")).toThrow(
            "Invalid manifest entry: 'express 4.18.2' (manifest line 2)",
        );
    });

    test("rejects an unparseable version", () => {
        expect(() => parseManifest("express==not-a-version")).toThrow(
            DependencyResolutionError,
        );
    });

    test("dist-tags are only accepted with @", () => {
        expect(() => parseManifest("express==latest")).toThrow(
            "Unsupported version constraint: 'express==latest' (manifest line 1)",
        );
    });

    test("rejects duplicate packages regardless of case", () => {
        let error: unknown;
        try {
            parseManifest("Express==4.0.0\nexpress==4.1.0");
        } catch (e) {
            error = e;
        }
        expect(error).toBeInstanceOf(DependencyResolutionError);
        expect(error).toMatchObject({ entry: "express", line: 2 });
    });

    test("canonical text ignores comments and operator spelling", () => {
        const a = parseManifest("# deps\nexpress==4.18.2\nms>=2");
        const b = parseManifest("express@4.18.2\n\nms >= 2 # time");

        expect(canonicalManifest(a)).toBe("express@4.18.2\nms@>=2");
        expect(canonicalManifest(b)).toBe(canonicalManifest(a));
    });

    test("builds the package.json dependencies block", () => {
        expect(toDependencies(parseManifest("express==4.18.2\nms"))).toEqual({
            express: "4.18.2",
            ms: "*",
        });
    });

    test("an empty manifest has no entries", () => {
        expect(parseManifest("# nothing yet\n\n")).toEqual([]);
    });
});
