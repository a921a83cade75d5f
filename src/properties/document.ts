// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Format-preserving document model.
 *
 * Entries live in an arena addressed by handles. The entry sequence is an
 * ordered list of handles and the key index maps each unescaped key to the
 * handle of its most recently appended PropertyEntry. Entries are immutable
 * values; changing one swaps the value stored under its handle, so the
 * sequence and the index can never disagree about what an entry holds.
 *
 * Duplicate keys stay in the sequence. Lookups see only the indexed one.
 */

import { Array as Arr, Brand, Equal, Hash, Option, pipe } from "effect";
import { type Diagnostic, type DiagnosticSink, ignoreDiagnostics } from "./diagnostics.js";
import {
  type Entry,
  type PropertyEntry,
  defaultPropertyEntry,
  isPropertyEntry,
  withValue,
} from "./entry.js";
import { parseEntries } from "./entry-parser.js";
import { escapeKey, escapeValue, unescape } from "./escape-codec.js";

export type EntryHandle = number & Brand.Brand<"EntryHandle">;
const EntryHandle = Brand.nominal<EntryHandle>();

export class PropertiesDocument implements Equal.Equal {
  private readonly arena = new Map<EntryHandle, Entry>();
  private order: EntryHandle[] = [];
  private readonly index = new Map<string, EntryHandle>();
  /** Unescaped key of every PropertyEntry in the arena, indexed or shadowed. */
  private readonly handleKeys = new Map<EntryHandle, string>();
  private nextHandle = 0;

  /** `onDiagnostic` receives malformed unicode escapes met while resolving keys and values. */
  constructor(private readonly onDiagnostic: DiagnosticSink = ignoreDiagnostics) {}

  /** Independent copy: mutating one document never shows in the other. */
  static from(other: PropertiesDocument): PropertiesDocument {
    const copy = new PropertiesDocument(other.onDiagnostic);
    for (const [handle, entry] of other.arena) {
      copy.arena.set(handle, entry);
    }
    for (const [key, handle] of other.index) {
      copy.index.set(key, handle);
    }
    for (const [handle, key] of other.handleKeys) {
      copy.handleKeys.set(handle, key);
    }
    copy.order = [...other.order];
    copy.nextHandle = other.nextHandle;
    return copy;
  }

  clone(): PropertiesDocument {
    return PropertiesDocument.from(this);
  }

  // ==========================================================================
  // Sequence
  // ==========================================================================

  get entries(): readonly Entry[] {
    return Arr.filterMap(this.order, (handle) => this.lookup(handle));
  }

  get propertyEntries(): readonly PropertyEntry[] {
    return this.entries.filter(isPropertyEntry);
  }

  /** Number of entries of either kind, duplicates included. */
  get entriesSize(): number {
    return this.arena.size;
  }

  /** Number of distinct keys. */
  get propertiesSize(): number {
    return this.index.size;
  }

  /** Add to the end. A PropertyEntry becomes the one its key resolves to. */
  append(entry: Entry): void {
    const handle = EntryHandle(this.nextHandle++);
    this.arena.set(handle, entry);
    this.order.push(handle);
    if (isPropertyEntry(entry)) {
      const key = this.logicalKey(entry);
      this.index.set(key, handle);
      this.handleKeys.set(handle, key);
    }
  }

  /** Remove every entry structurally equal to `entry`. Returns how many went. */
  removeEntry(entry: Entry): number {
    const [kept, removed] = Arr.partition(this.order, (handle) =>
      Option.exists(this.lookup(handle), (e) => Equal.equals(e, entry))
    );
    for (const handle of removed) {
      this.release(handle);
    }
    this.order = kept;
    this.compact();
    return removed.length;
  }

  /**
   * Put `replacement` where the first entry equal to `original` sits.
   * Returns false, changing nothing, when there is no such entry.
   */
  replace(original: Entry, replacement: Entry): boolean {
    return pipe(
      Arr.findFirst(this.order, (handle) =>
        Option.exists(this.lookup(handle), (e) => Equal.equals(e, original))
      ),
      Option.match({
        onNone: () => false,
        onSome: (handle) => {
          this.store(handle, replacement);
          return true;
        },
      })
    );
  }

  clear(): void {
    this.arena.clear();
    this.index.clear();
    this.handleKeys.clear();
    this.order = [];
  }

  /** Replace the whole sequence, rebuilding the index as if each entry were appended. */
  setEntries(entries: Iterable<Entry>): void {
    this.clear();
    for (const entry of entries) {
      this.append(entry);
    }
  }

  // ==========================================================================
  // Keyed access (unescaped keys and values)
  // ==========================================================================

  containsKey(key: string): boolean {
    return this.index.has(key);
  }

  getPropertyEntry(key: string): Option.Option<PropertyEntry> {
    return pipe(
      Option.fromNullable(this.index.get(key)),
      Option.flatMap((handle) => this.lookup(handle)),
      Option.filter(isPropertyEntry)
    );
  }

  get(key: string): Option.Option<string> {
    return pipe(
      this.getPropertyEntry(key),
      Option.map((entry) => unescape(entry.value, this.onDiagnostic))
    );
  }

  /**
   * Change the value of `key` in place, keeping its layout. A new key is
   * appended as `key = value`.
   */
  set(key: string, value: string): void {
    const escaped = escapeValue(value);
    if (!this.modify(key, (entry) => withValue(entry, escaped))) {
      this.append(defaultPropertyEntry(escapeKey(key), escaped));
    }
  }

  /**
   * Swap the entry `key` resolves to for `f(entry)`, in place. Returns false
   * when the key is unknown.
   */
  modify(key: string, f: (entry: PropertyEntry) => Entry): boolean {
    return pipe(
      Option.fromNullable(this.index.get(key)),
      Option.flatMap((handle) =>
        pipe(
          this.lookup(handle),
          Option.filter(isPropertyEntry),
          Option.map((entry) => this.store(handle, f(entry)))
        )
      ),
      Option.isSome
    );
  }

  /** Drop the entry `key` resolves to. Other entries with the same key stay. */
  remove(key: string): boolean {
    return pipe(
      Option.fromNullable(this.index.get(key)),
      Option.map((handle) => {
        this.release(handle);
        this.compact();
      }),
      Option.isSome
    );
  }

  /** Distinct unescaped keys, in the order they were first indexed. */
  keys(): readonly string[] {
    return Array.from(this.index.keys());
  }

  values(): readonly string[] {
    return Arr.filterMap(this.keys(), (key) => this.get(key));
  }

  toMap(): ReadonlyMap<string, string> {
    return new Map(Arr.filterMap(this.keys(), (key) => Option.map(this.get(key), (v) => [key, v] as const)));
  }

  // ==========================================================================
  // Equality
  // ==========================================================================

  /** Equal when both would serialize to the same text. */
  equals(that: PropertiesDocument): boolean {
    const mine = this.entries;
    const theirs = that.entries;
    return mine.length === theirs.length && mine.every((entry, i) => Equal.equals(entry, theirs[i]));
  }

  [Equal.symbol](that: Equal.Equal): boolean {
    return that instanceof PropertiesDocument && this.equals(that);
  }

  [Hash.symbol](): number {
    return Hash.array(this.entries);
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private lookup(handle: EntryHandle): Option.Option<Entry> {
    return Option.fromNullable(this.arena.get(handle));
  }

  private logicalKey(entry: PropertyEntry): string {
    return unescape(entry.key, this.onDiagnostic);
  }

  /** Overwrite the slot. An index entry keeps its position when the key stays the same. */
  private store(handle: EntryHandle, entry: Entry): void {
    const newKey = pipe(
      Option.some(entry),
      Option.filter(isPropertyEntry),
      Option.map((e) => this.logicalKey(e))
    );
    pipe(
      Option.fromNullable(this.handleKeys.get(handle)),
      Option.filter((oldKey) => !Option.contains(newKey, oldKey)),
      Option.map((oldKey) => this.unindex(handle, oldKey))
    );
    this.arena.set(handle, entry);
    Option.match(newKey, {
      onNone: () => this.handleKeys.delete(handle),
      onSome: (key) => {
        this.index.set(key, handle);
        this.handleKeys.set(handle, key);
      },
    });
  }

  private release(handle: EntryHandle): void {
    pipe(
      Option.fromNullable(this.handleKeys.get(handle)),
      Option.map((key) => this.unindex(handle, key))
    );
    this.arena.delete(handle);
  }

  /** Drop `key` from the index only while it still resolves to `handle`. */
  private unindex(handle: EntryHandle, key: string): void {
    if (this.index.get(key) === handle) {
      this.index.delete(key);
    }
    this.handleKeys.delete(handle);
  }

  /** Released handles stay in the order list until they outnumber the live ones. */
  private compact(): void {
    if (this.order.length > 2 * this.arena.size) {
      this.order = this.order.filter((handle) => this.arena.has(handle));
    }
  }
}

export interface ParsedDocument {
  readonly document: PropertiesDocument;
  /** Findings raised while the text was being parsed. */
  readonly diagnostics: readonly Diagnostic[];
}

/**
 * Parse document text. Never fails; malformed escapes in keys and values come
 * back as diagnostics and also reach `onDiagnostic`, which keeps receiving
 * the ones later lookups raise.
 */
export const parseDocument = (text: string, onDiagnostic: DiagnosticSink = ignoreDiagnostics): ParsedDocument => {
  const diagnostics: Diagnostic[] = [];
  let parsing = true;
  const report: DiagnosticSink = (diagnostic) => {
    if (parsing) {
      diagnostics.push(diagnostic);
    }
    onDiagnostic(diagnostic);
  };
  const document = new PropertiesDocument(report);
  for (const entry of parseEntries(text)) {
    document.append(entry);
    if (isPropertyEntry(entry)) {
      unescape(entry.value, report);
    }
  }
  parsing = false;
  return { document, diagnostics };
};
