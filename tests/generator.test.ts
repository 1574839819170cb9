import { describe, expect, it } from "vitest";
import { parseConfig } from "../src/builder.js";
import { JsonGenerator } from "../src/generator/JsonGenerator.js";
import { documentToPlain } from "../src/types/Value.js";

describe("JsonGenerator", () => {
    it("writes ordered, indented JSON with non-ASCII text unescaped", () => {
        const document = parseConfig(`name = "Привет"\nport = 8080\nflags = (list true, false)\nempty = (list)\nnested struct{ }`);
        expect(new JsonGenerator().generate(document)).toBe(
            [
                "{",
                '  "name": "Привет",',
                '  "port": 8080,',
                '  "flags": [',
                "    true,",
                "    false",
                "  ],",
                '  "empty": [],',
                '  "nested": {}',
                "}",
            ].join("\n")
        );
    });

    it("matches JSON.stringify for ordinary documents", () => {
        const document = parseConfig("a := 1; s struct{ b = (list a, 'x', struct{ c = flag }) }");
        expect(new JsonGenerator().generate(document)).toBe(JSON.stringify(documentToPlain(document), null, 2));
    });

    it("writes large integers as plain digits", () => {
        expect(new JsonGenerator().generate(parseConfig("big = 123456789012345678901234567890"))).toBe(
            '{\n  "big": 123456789012345678901234567890\n}'
        );
    });

    it("honours a custom indentation width", () => {
        expect(new JsonGenerator(4).generate(parseConfig("p struct{x=1}"))).toBe(
            '{\n    "p": {\n        "x": 1\n    }\n}'
        );
    });

    it("writes an empty document as an empty object", () => {
        expect(new JsonGenerator().generate(parseConfig("# nothing here"))).toBe("{}");
    });
});
