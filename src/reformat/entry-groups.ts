// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Groups comments and blank lines with a neighbouring property so that they
 * move together when entries are reordered. The attachment policy decides
 * the neighbour; grouping and sorting are looked up per policy in one table.
 */

import { Array as Arr, Option, Order, pipe } from "effect";
import type { AttachCommentsTo } from "../config/field-values.js";
import { assert } from "../lib/assert.js";
import { type Entry, type PropertyEntry, isPropertyEntry } from "../properties/entry.js";
import { unescape } from "../properties/escape-codec.js";

export interface EntryGroup {
  /** The one property of the group; None for a run of comments with no property to join. */
  readonly property: Option.Option<PropertyEntry>;
  readonly entries: readonly Entry[];
}

/** Build a group. More than one property in a group is a programming error. */
export const makeGroup = (entries: readonly Entry[]): EntryGroup => {
  assert(entries.length > 0, "An entry group cannot be empty");
  const properties = entries.filter(isPropertyEntry);
  assert(properties.length <= 1, `An entry group holds at most one property, got ${properties.length}`);
  return { property: Arr.head(properties), entries: [...entries] };
};

/** Escaped key text, which is what groups are sorted by. */
export const groupKey = (group: EntryGroup): Option.Option<string> =>
  Option.map(group.property, (p) => p.key);

/** Unescaped key, used to match groups against a template. */
export const groupLogicalKey = (group: EntryGroup): Option.Option<string> =>
  Option.map(group.property, (p) => unescape(p.key));

const byEscapedKey: Order.Order<EntryGroup> = Order.mapInput(Order.string, (group: EntryGroup) =>
  Option.getOrElse(groupKey(group), () => "")
);

const hasProperty = (group: EntryGroup): boolean => Option.isSome(group.property);

// ============================================================================
// Grouping
// ============================================================================

/** Comments join the property that follows them; a trailing run stands alone. */
const groupWithNext = (entries: readonly Entry[]): readonly EntryGroup[] => {
  const groups: EntryGroup[] = [];
  let pending: Entry[] = [];
  for (const entry of entries) {
    pending.push(entry);
    if (isPropertyEntry(entry)) {
      groups.push(makeGroup(pending));
      pending = [];
    }
  }
  if (pending.length > 0) {
    groups.push(makeGroup(pending));
  }
  return groups;
};

/** Comments join the property before them; a leading run stands alone. */
const groupWithPrev = (entries: readonly Entry[]): readonly EntryGroup[] => {
  const groups: EntryGroup[] = [];
  let pending: Entry[] = [];
  for (const entry of entries) {
    if (isPropertyEntry(entry) && pending.length > 0) {
      groups.push(makeGroup(pending));
      pending = [];
    }
    pending.push(entry);
  }
  if (pending.length > 0) {
    groups.push(makeGroup(pending));
  }
  return groups;
};

const groupSingletons = (entries: readonly Entry[]): readonly EntryGroup[] =>
  entries.map((entry) => makeGroup([entry]));

// ============================================================================
// Sorting
// ============================================================================

/** Stable sort by escaped key; keyless groups go last. */
const sortKeylessLast = (groups: readonly EntryGroup[]): readonly EntryGroup[] => {
  const [keyless, keyed] = Arr.partition(groups, hasProperty);
  return [...Arr.sort(keyed, byEscapedKey), ...keyless];
};

/** Stable sort by escaped key; keyless groups go first. */
const sortKeylessFirst = (groups: readonly EntryGroup[]): readonly EntryGroup[] => {
  const [keyless, keyed] = Arr.partition(groups, hasProperty);
  return [...keyless, ...Arr.sort(keyed, byEscapedKey)];
};

/**
 * Property groups are sorted among themselves and dealt back into the slots
 * property groups occupied; every other group keeps its index.
 */
const sortInPlace = (groups: readonly EntryGroup[]): readonly EntryGroup[] => {
  const sorted = Arr.sort(groups.filter(hasProperty), byEscapedKey);
  let next = 0;
  return groups.map((group) => {
    if (!hasProperty(group)) {
      return group;
    }
    const replacement = sorted[next++];
    assert(replacement !== undefined, "Ran out of sorted property groups");
    return replacement;
  });
};

interface AttachmentStrategy {
  readonly group: (entries: readonly Entry[]) => readonly EntryGroup[];
  readonly sort: (groups: readonly EntryGroup[]) => readonly EntryGroup[];
}

const STRATEGIES: Readonly<Record<AttachCommentsTo, AttachmentStrategy>> = {
  next: { group: groupWithNext, sort: sortKeylessLast },
  prev: { group: groupWithPrev, sort: sortKeylessFirst },
  "original-position": { group: groupSingletons, sort: sortInPlace },
};

export const groupEntries = (entries: readonly Entry[], policy: AttachCommentsTo): readonly EntryGroup[] =>
  STRATEGIES[policy].group(entries);

export const sortGroups = (groups: readonly EntryGroup[], policy: AttachCommentsTo): readonly EntryGroup[] =>
  STRATEGIES[policy].sort(groups);

export const flattenGroups = (groups: readonly EntryGroup[]): readonly Entry[] =>
  pipe(
    groups,
    Arr.flatMap((group) => group.entries)
  );
