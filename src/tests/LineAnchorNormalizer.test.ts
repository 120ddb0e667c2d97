import { describe, it, expect } from "@jest/globals";
import { isBlank, stripLineNumbers, trimTrailingWhitespace } from "../engine/LineAnchorNormalizer.js";

describe("stripLineNumbers", () => {
    it("removes numbered prefixes when most lines carry them", () => {
        expect(stripLineNumbers("1| const a = 1;\n2| const b = 2;\n3| return a + b;"))
            .toBe("const a = 1;\nconst b = 2;\nreturn a + b;");
    });

    it("keeps text where only a minority of lines look numbered", () => {
        const text = "1| first\nsecond\nthird";
        expect(stripLineNumbers(text)).toBe(text);
    });

    it("ignores empty lines when counting", () => {
        expect(stripLineNumbers("10| a\n\n11| b\n")).toBe("a\n\nb\n");
    });

    it("returns blank input unchanged", () => {
        expect(stripLineNumbers("   ")).toBe("   ");
        expect(stripLineNumbers("")).toBe("");
    });
});

describe("trimTrailingWhitespace", () => {
    it("trims line ends and keeps indentation", () => {
        expect(trimTrailingWhitespace("a  \n  b\t\n")).toBe("a\n  b\n");
    });

    it("drops carriage returns left by CRLF input", () => {
        expect(trimTrailingWhitespace("one\r\ntwo")).toBe("one\ntwo");
    });
});

describe("isBlank", () => {
    it("treats whitespace-only text as blank", () => {
        expect(isBlank(" \n\t")).toBe(true);
        expect(isBlank(" x ")).toBe(false);
    });
});
