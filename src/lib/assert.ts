// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Assertion utilities for internal invariants. A failed assertion is a
 * programming error: it throws a GeneralError instead of failing an Effect.
 */

import { ErrorCode, GeneralError } from "./errors.js";

/**
 * Assert that a condition is true at runtime.
 * Throws GeneralError if the assertion fails.
 */
export const assert: (condition: boolean, message: string) => asserts condition = (
  condition: boolean,
  message: string
): asserts condition => {
  if (!condition) {
    throw new GeneralError({ code: ErrorCode.INVARIANT_VIOLATION, message });
  }
};
