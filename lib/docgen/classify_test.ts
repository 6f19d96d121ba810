import assert from "node:assert/strict";
import { test } from "node:test";
import { classifyLine, stripLineComment } from "./classify.ts";
import { souffleDialect } from "./dialect.ts";
import { DocgenError } from "./errors.ts";

const classify = (line: string, lineNo?: number) =>
    classifyLine(line, souffleDialect, lineNo);

test("classifyLine: blanks and directives", async (t) => {
    await t.test("whitespace-only lines are blank", () => {
        assert.deepEqual(classify("\n"), { kind: "blank" });
        assert.deepEqual(classify("  \t \n"), { kind: "blank" });
    });

    await t.test("lines starting with # are directives", () => {
        assert.deepEqual(classify('#include "base.dl"\n'), {
            kind: "directive",
        });
        assert.deepEqual(classify("#define MAX 3\n"), { kind: "directive" });
    });

    await t.test("an indented # is plain code", () => {
        assert.deepEqual(classify("  #x\n"), { kind: "code", line: "  #x\n" });
    });
});

test("classifyLine: comments", async (t) => {
    await t.test("markers and one leading space are removed", () => {
        assert.deepEqual(classify("// Base case.\n"), {
            kind: "comment",
            text: "Base case.\n",
            headingMarks: 0,
        });
        assert.deepEqual(classify("//   indented\n"), {
            kind: "comment",
            text: "  indented\n",
            headingMarks: 0,
        });
    });

    await t.test("any number of leading slashes is stripped", () => {
        assert.deepEqual(classify("//// loud\n"), {
            kind: "comment",
            text: "loud\n",
            headingMarks: 0,
        });
    });

    await t.test("heading markers are counted", () => {
        assert.deepEqual(classify("// ## Rules\n"), {
            kind: "comment",
            text: "## Rules\n",
            headingMarks: 2,
        });
        assert.deepEqual(classify("//#### Deep\n"), {
            kind: "comment",
            text: "#### Deep\n",
            headingMarks: 4,
        });
    });

    await t.test("an empty comment keeps only its terminator", () => {
        assert.deepEqual(classify("//\n"), {
            kind: "comment",
            text: "\n",
            headingMarks: 0,
        });
    });

    await t.test("trailing slashes go only when nothing follows them", () => {
        assert.equal(stripLineComment("// a path//\n", "//"), "a path//\n");
        assert.equal(stripLineComment("// a path//", "//"), "a path");
    });
});

test("classifyLine: declarations", async (t) => {
    await t.test("the identifier is the leading name of the second token", () => {
        assert.deepEqual(classify(".decl Foo(x: number)\n"), {
            kind: "declaration",
            keyword: ".decl",
            identifier: "Foo",
            line: ".decl Foo(x: number)\n",
        });
    });

    await t.test(".type works the same way", () => {
        const line = ".type Point = [x: number, y: number]\n";
        assert.deepEqual(classify(line), {
            kind: "declaration",
            keyword: ".type",
            identifier: "Point",
            line,
        });
    });

    await t.test("digits end the identifier, ? and _ may start it", () => {
        const id = (line: string) => {
            const c = classify(line);
            return c.kind === "declaration" ? c.identifier : undefined;
        };
        assert.equal(id(".decl node2edge(n: number)\n"), "node");
        assert.equal(id(".decl ?query(x: symbol)\n"), "?query");
        assert.equal(id(".decl _hidden(x: symbol)\n"), "_hidden");
        assert.equal(id(".decl subset_of(a: T, b: T)\n"), "subset_of");
    });

    await t.test("leading whitespace and extra spacing are tolerated", () => {
        const line = "   .decl   edge(a: number, b: number)\n";
        assert.deepEqual(classify(line), {
            kind: "declaration",
            keyword: ".decl",
            identifier: "edge",
            line,
        });
    });

    await t.test("keywords must match exactly", () => {
        assert.deepEqual(classify(".declare x\n"), {
            kind: "code",
            line: ".declare x\n",
        });
        assert.deepEqual(classify(".output edge\n"), {
            kind: "code",
            line: ".output edge\n",
        });
    });

    await t.test("a keyword without a name is malformed", () => {
        assert.throws(
            () => classify(".decl\n", 7),
            (err: unknown) => {
                assert.ok(err instanceof DocgenError);
                assert.equal(err.code, "malformed_declaration");
                assert.equal(err.line, 7);
                assert.equal(err.message, ".decl without a name: .decl");
                return true;
            },
        );
    });

    await t.test("a name that can't start an identifier is malformed", () => {
        assert.throws(
            () => classify(".type 3d = number\n", 2),
            (err: unknown) =>
                err instanceof DocgenError &&
                err.code === "malformed_declaration" &&
                err.line === 2,
        );
    });
});

test("classifyLine: everything else is code", () => {
    assert.deepEqual(classify("edge(1, 2).\n"), {
        kind: "code",
        line: "edge(1, 2).\n",
    });
    assert.deepEqual(classify("path(x, z) :- edge(x, y), path(y, z)."), {
        kind: "code",
        line: "path(x, z) :- edge(x, y), path(y, z).",
    });
});
