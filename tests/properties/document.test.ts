// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { Equal, Hash, Option } from "effect";
import { describe, expect, test } from "vitest";
import { collectDiagnostics } from "../../src/properties/diagnostics.js";
import { PropertiesDocument, parseDocument } from "../../src/properties/document.js";
import { BasicEntry, PropertyEntry, entryText, withValue } from "../../src/properties/entry.js";

const textOf = (document: PropertiesDocument): string => document.entries.map(entryText).join("");

const parse = (text: string): PropertiesDocument => parseDocument(text).document;

describe("PropertiesDocument", () => {
  describe("parseDocument", () => {
    test("resolves continued values", () => {
      const document = parse("keyA = va\\\n  lueA\n");
      expect(document.get("keyA")).toEqual(Option.some("valueA"));
      expect(textOf(document)).toBe("keyA = va\\\n  lueA\n");
    });

    test("indexes keys by their unescaped form", () => {
      const document = parse("my\\ key = v\n");
      expect(document.containsKey("my key")).toBe(true);
      expect(document.containsKey("my\\ key")).toBe(false);
    });

    test("collects diagnostics from keys and values while parsing", () => {
      const { diagnostics } = parseDocument("bad = \\uZZZZ\nk\\u12 = v");
      expect(diagnostics.map((d) => d.reason)).toEqual(["invalid-hex", "truncated"]);
      expect(diagnostics.map((d) => d.sequence)).toEqual(["\\uZZZZ", "\\u12"]);
    });

    test("passes parse-time and later diagnostics to the sink", () => {
      const { sink, diagnostics: seen } = collectDiagnostics();
      const { document, diagnostics } = parseDocument("bad = \\uZZZZ\n", sink);
      expect(document.get("bad")).toEqual(Option.some("\\uZZZZ"));
      expect(diagnostics.map((d) => d.sequence)).toEqual(["\\uZZZZ"]);
      expect(seen.map((d) => d.sequence)).toEqual(["\\uZZZZ", "\\uZZZZ"]);
    });
  });

  describe("sizes", () => {
    test("count entries and distinct keys separately", () => {
      const document = parse("# c\na=1\na=2\n\nb=3\n");
      expect(document.entriesSize).toBe(5);
      expect(document.propertiesSize).toBe(2);
      expect(document.propertyEntries).toHaveLength(3);
    });
  });

  describe("duplicate keys", () => {
    test("the last occurrence wins", () => {
      const document = parse("a=1\na=2\n");
      expect(document.get("a")).toEqual(Option.some("2"));
    });

    test("remove drops only the indexed occurrence", () => {
      const document = parse("a=1\nb=x\na=2\n");
      expect(document.remove("a")).toBe(true);
      expect(textOf(document)).toBe("a=1\nb=x\n");
      expect(document.containsKey("a")).toBe(false);
    });

    test("changing a shadowed occurrence leaves the indexed one in place", () => {
      const document = parse("a=1\na=2\n");
      const [shadowed] = document.propertyEntries;
      expect(shadowed).toBeDefined();
      if (shadowed !== undefined) {
        document.replace(
          shadowed,
          PropertyEntry({
            leadingWhitespace: shadowed.leadingWhitespace,
            key: "b",
            separator: shadowed.separator,
            value: shadowed.value,
            lineEnding: shadowed.lineEnding,
          })
        );
      }
      expect(document.get("a")).toEqual(Option.some("2"));
      expect(document.get("b")).toEqual(Option.some("1"));
      expect(document.keys()).toEqual(["a", "b"]);
    });
  });

  describe("set", () => {
    test("changes the value and keeps the layout", () => {
      const document = parse("  key :\told\r\n");
      document.set("key", "new value");
      expect(textOf(document)).toBe("  key :\tnew value\r\n");
    });

    test("appends an unknown key with escaping", () => {
      const document = parse("a=1\n");
      document.set("new key", "line1\nline2");
      expect(textOf(document)).toBe("a=1\nnew\\ key = line1\\nline2\n");
      expect(document.get("new key")).toEqual(Option.some("line1\nline2"));
    });

    test("does not move the key in the key order", () => {
      const document = parse("a=1\nb=2\n");
      document.set("a", "3");
      expect(document.keys()).toEqual(["a", "b"]);
    });
  });

  describe("modify", () => {
    test("returns false for an unknown key", () => {
      const document = parse("a=1\n");
      expect(document.modify("b", (e) => e)).toBe(false);
    });

    test("can turn a property into a comment", () => {
      const document = parse("a=1\nb=2\n");
      expect(document.modify("a", () => BasicEntry({ raw: "#a=1\n" }))).toBe(true);
      expect(document.containsKey("a")).toBe(false);
      expect(textOf(document)).toBe("#a=1\nb=2\n");
    });

    test("can rename a key", () => {
      const document = parse("a=1\n");
      document.modify("a", (entry) =>
        PropertyEntry({
          leadingWhitespace: entry.leadingWhitespace,
          key: "z",
          separator: entry.separator,
          value: entry.value,
          lineEnding: entry.lineEnding,
        })
      );
      expect(document.keys()).toEqual(["z"]);
      expect(document.get("z")).toEqual(Option.some("1"));
    });
  });

  describe("entry operations", () => {
    test("removeEntry drops every equal entry", () => {
      const document = parse("\na=1\n\nb=2\n");
      expect(document.removeEntry(BasicEntry({ raw: "\n" }))).toBe(2);
      expect(textOf(document)).toBe("a=1\nb=2\n");
    });

    test("replace swaps the first equal entry", () => {
      const document = parse("# x\na=1\n# x\n");
      expect(document.replace(BasicEntry({ raw: "# x\n" }), BasicEntry({ raw: "# y\n" }))).toBe(true);
      expect(textOf(document)).toBe("# y\na=1\n# x\n");
    });

    test("replace reports a missing entry", () => {
      const document = parse("a=1\n");
      expect(document.replace(BasicEntry({ raw: "# x\n" }), BasicEntry({ raw: "# y\n" }))).toBe(false);
      expect(textOf(document)).toBe("a=1\n");
    });

    test("replace re-indexes a property", () => {
      const document = parse("a=1\n");
      const [original] = document.propertyEntries;
      expect(original).toBeDefined();
      if (original !== undefined) {
        document.replace(original, withValue(original, "2"));
      }
      expect(document.get("a")).toEqual(Option.some("2"));
    });

    test("removed entries leave sizes and text consistent", () => {
      const document = parse("a=1\nb=2\nc=3\n");
      document.remove("b");
      expect(document.entriesSize).toBe(2);
      document.set("b", "4");
      document.remove("a");
      expect(document.entriesSize).toBe(2);
      expect(document.propertiesSize).toBe(2);
      expect(textOf(document)).toBe("c=3\nb = 4\n");
    });

    test("changes every key of a large document", () => {
      const size = 20_000;
      const document = parse(Array.from({ length: size }, (_, i) => `key${i} = ${i}\n`).join(""));
      for (let i = 0; i < size; i++) {
        document.set(`key${i}`, `v${i}`);
      }
      for (let i = 0; i < size; i += 10) {
        document.remove(`key${i}`);
      }
      expect(document.entriesSize).toBe(18_000);
      expect(document.propertiesSize).toBe(18_000);
      expect(document.get("key19999")).toEqual(Option.some("v19999"));
      expect(document.containsKey("key10")).toBe(false);
      expect(document.keys()[0]).toBe("key1");
    });

    test("clear empties the document", () => {
      const document = parse("a=1\n# c\n");
      document.clear();
      expect(document.entriesSize).toBe(0);
      expect(document.propertiesSize).toBe(0);
    });

    test("setEntries rebuilds the index", () => {
      const document = parse("a=1\n");
      document.setEntries(parse("b=2\nc=3\n").entries);
      expect(document.keys()).toEqual(["b", "c"]);
    });
  });

  describe("views", () => {
    test("keys, values and toMap use logical strings", () => {
      const document = parse("a\\ b = x\\ty\nc = z\n");
      expect(document.keys()).toEqual(["a b", "c"]);
      expect(document.values()).toEqual(["xty", "z"]);
      expect(document.toMap()).toEqual(
        new Map([
          ["a b", "xty"],
          ["c", "z"],
        ])
      );
    });
  });

  describe("copies and equality", () => {
    test("clone is independent of the original", () => {
      const original = parse("a=1\n");
      const copy = original.clone();
      copy.set("a", "2");
      copy.set("b", "3");
      expect(original.get("a")).toEqual(Option.some("1"));
      expect(original.containsKey("b")).toBe(false);
      expect(copy.get("a")).toEqual(Option.some("2"));
    });

    test("documents with the same entries are equal", () => {
      const a = parse("# c\nk = v\n");
      const b = parse("# c\nk = v\n");
      expect(Equal.equals(a, b)).toBe(true);
      expect(Hash.hash(a)).toBe(Hash.hash(b));
      expect(a.equals(PropertiesDocument.from(a))).toBe(true);
    });

    test("layout differences make documents unequal", () => {
      expect(Equal.equals(parse("k = v\n"), parse("k=v\n"))).toBe(false);
    });
  });
});
