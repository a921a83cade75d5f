// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { PassThrough, Readable } from "node:stream";
import { text } from "node:stream/consumers";
import { Effect, Option } from "effect";
import { afterAll, beforeAll, describe, expect, test } from "vitest";
import { reformatOptions, writeOptions } from "../../src/config/options.js";
import { encode } from "../../src/properties/charset.js";
import { parseDocument } from "../../src/properties/document.js";
import {
  loadDocument,
  overwriteFile,
  readDocumentFrom,
  reformatFile,
  reorderFileByKey,
  reorderFileByTemplate,
  saveTo,
  updateFile,
  writeToSink,
} from "../../src/system/properties-file.js";
import { makeCapturingLogger, runTest } from "../helpers/layers.js";

describe("properties-file", () => {
  let dir = "";
  let counter = 0;

  const freshPath = (): string => join(dir, `file-${counter++}.properties`);

  beforeAll(async () => {
    dir = await mkdtemp(join(tmpdir(), "propkeep-file-"));
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  describe("loadDocument", () => {
    test("parses the file", async () => {
      const path = freshPath();
      await writeFile(path, "# settings\nkeyA = va\\\n  lueA\n");
      const document = await runTest(loadDocument(path));
      expect(document.get("keyA")).toEqual(Option.some("valueA"));
      expect(document.entriesSize).toBe(2);
    });

    test("decodes the requested charset", async () => {
      const path = freshPath();
      await writeFile(path, encode("gr\u00fc\u00dfe = hallo\n", "UTF-16"));
      const document = await runTest(loadDocument(path, "UTF-16"));
      expect(document.get("gr\u00fc\u00dfe")).toEqual(Option.some("hallo"));
    });

    test("fails for a missing file", async () => {
      const error = await runTest(Effect.flip(loadDocument(join(dir, "absent.properties"))));
      expect(error.code).toBe(30);
    });

    test("logs malformed escapes as warnings for the file", async () => {
      const path = freshPath();
      await writeFile(path, "k\\u12=1\n");
      const { layer, logs } = makeCapturingLogger();
      await Effect.runPromise(loadDocument(path).pipe(Effect.provide(layer)));
      const warnings = logs.filter((log) => log.level === "WARN");
      expect(warnings.map((log) => log.message)).toEqual([
        'Truncated unicode escape "\\u12" at end of text',
      ]);
      expect(warnings[0]?.file).toEqual(Option.some(path));
    });
  });

  describe("loadDocument value escapes", () => {
    test("logs malformed escapes in values", async () => {
      const path = freshPath();
      await writeFile(path, "bad = \\uZZZZ\n");
      const { layer, logs } = makeCapturingLogger();
      await Effect.runPromise(loadDocument(path).pipe(Effect.provide(layer)));
      expect(logs.filter((log) => log.level === "WARN").map((log) => log.message)).toEqual([
        'Invalid unicode escape "\\uZZZZ": expected four hex digits',
      ]);
    });
  });

  describe("readDocumentFrom", () => {
    test("reads a whole stream", async () => {
      const stream = Readable.from([Buffer.from("a=1\n"), Buffer.from("b=2\n")]);
      const document = await runTest(readDocumentFrom(stream));
      expect(document.keys()).toEqual(["a", "b"]);
    });
  });

  describe("overwriteFile", () => {
    test("writes the document text", async () => {
      const path = freshPath();
      await writeFile(path, "old = content\n");
      const { document } = parseDocument("# new\nk = v\n");
      await runTest(overwriteFile(document, path));
      expect(await readFile(path, "utf8")).toBe("# new\nk = v\n");
    });

    test("escapes what the charset cannot hold", async () => {
      const path = freshPath();
      const { document } = parseDocument("k = caf\u00e9 \u20ac\n");
      await runTest(overwriteFile(document, path, writeOptions({ charset: "US-ASCII" })));
      expect(await readFile(path, "latin1")).toBe("k = caf\\u00e9 \\u20ac\n");
    });
  });

  describe("updateFile and saveTo", () => {
    const existing = "# keep\na = 1\nb = 2\n";

    test("updateFile patches values and comments out missing keys", async () => {
      const path = freshPath();
      await writeFile(path, existing);
      const { document } = parseDocument("a=10\nc=3\n");
      await runTest(updateFile(document, path, writeOptions({ missingKeyAction: "comment" })));
      expect(await readFile(path, "utf8")).toBe("# keep\na = 10\n#b = 2\nc=3\n");
    });

    test("updateFile logs malformed escapes in the new values", async () => {
      const path = freshPath();
      await writeFile(path, "a = 1\n");
      const { document } = parseDocument("a=\\uZZZZ\n");
      const { layer, logs } = makeCapturingLogger();
      await Effect.runPromise(
        updateFile(document, path, writeOptions({ unicodeHandling: "do-nothing" })).pipe(Effect.provide(layer))
      );
      const warnings = logs.filter((log) => log.level === "WARN");
      expect(warnings.map((log) => log.message)).toEqual([
        'Invalid unicode escape "\\uZZZZ": expected four hex digits',
      ]);
      expect(warnings[0]?.file).toEqual(Option.some(path));
      expect(await readFile(path, "utf8")).toBe("a = \\uZZZZ\n");
    });

    test("saveTo updates an existing file by default", async () => {
      const path = freshPath();
      await writeFile(path, existing);
      const { document } = parseDocument("a=10\nc=3\n");
      await runTest(saveTo(document, path));
      expect(await readFile(path, "utf8")).toBe("# keep\na = 10\nb = 2\nc=3\n");
    });

    test("saveTo can overwrite an existing file", async () => {
      const path = freshPath();
      await writeFile(path, existing);
      const { document } = parseDocument("a=10\nc=3\n");
      await runTest(saveTo(document, path, writeOptions(), "overwrite"));
      expect(await readFile(path, "utf8")).toBe("a=10\nc=3\n");
    });

    test("saveTo creates a new file", async () => {
      const path = join(dir, "created", "new.properties");
      const { document } = parseDocument("a=1\n");
      await runTest(saveTo(document, path));
      expect(await readFile(path, "utf8")).toBe("a=1\n");
    });
  });

  describe("writeToSink", () => {
    test("writes the document and ends the stream", async () => {
      const stream = new PassThrough();
      const collected = text(stream);
      const { document } = parseDocument("k = v\r\n");
      await runTest(writeToSink(document, stream));
      expect(await collected).toBe("k = v\r\n");
    });
  });

  describe("file-level reformatting", () => {
    test("reformatFile rewrites the layout", async () => {
      const path = freshPath();
      await writeFile(path, "  a:1\r\n# c\r\n");
      await runTest(reformatFile(path));
      expect(await readFile(path, "utf8")).toBe("a = 1\n# c\n");
    });

    test("reformatFile leaves the file alone for an invalid format", async () => {
      const path = freshPath();
      await writeFile(path, "  a:1\r\n");
      const error = await runTest(Effect.flip(reformatFile(path, reformatOptions({ format: "<value>" }))));
      expect(error._tag).toBe("FormatError");
      expect(await readFile(path, "utf8")).toBe("  a:1\r\n");
    });

    test("reorderFileByKey sorts the file", async () => {
      const path = freshPath();
      await writeFile(path, "b=2\n# for a\na=1\n");
      await runTest(reorderFileByKey(path));
      expect(await readFile(path, "utf8")).toBe("# for a\na=1\nb=2\n");
    });

    test("reorderFileByTemplate follows the template file", async () => {
      const templatePath = freshPath();
      const path = freshPath();
      await writeFile(templatePath, "c=\na=\n");
      await writeFile(path, "a=1\nb=2\nc=3\n");
      await runTest(reorderFileByTemplate(templatePath, path));
      expect(await readFile(path, "utf8")).toBe("c=3\na=1\nb=2\n");
      expect(await readFile(templatePath, "utf8")).toBe("c=\na=\n");
    });
  });
});
