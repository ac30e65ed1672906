// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Apply-hook dispatch. A hook turns one accepted value into derived writes
 * (COUNTRY=DE sets TIMEZONE, LOCALE and the keyboard). Derived writes may
 * trigger hooks of their own; the running chain is tracked on the store.
 */

import { Effect, Option } from "effect";
import { ApplyCycleError, ErrorCode, type SetError } from "../lib/errors";
import type { SettingDef, SettingWrite } from "./model";
import type { ConfigStore } from "./store";

/** Longest hook chain before the cascade is treated as runaway. */
export const MAX_APPLY_DEPTH = 8;

const guard = (store: ConfigStore, name: string): Effect.Effect<void, ApplyCycleError> => {
  const chain = [...store.applying, name];
  if (store.applying.includes(name)) {
    return Effect.fail(
      new ApplyCycleError({
        code: ErrorCode.APPLY_CYCLE,
        chain,
        message: `Apply hooks form a cycle: ${chain.join(" -> ")}`,
      })
    );
  }
  if (store.applying.length >= MAX_APPLY_DEPTH) {
    return Effect.fail(
      new ApplyCycleError({
        code: ErrorCode.APPLY_CYCLE,
        chain,
        message: `Apply hooks nested deeper than ${MAX_APPLY_DEPTH}: ${chain.join(" -> ")}`,
      })
    );
  }
  return Effect.void;
};

/**
 * Run `def`'s apply hook for `value`, routing each derived write through
 * `write`. The chain entry is removed whether or not the writes succeed.
 */
export const dispatchApply = (
  store: ConfigStore,
  def: SettingDef,
  value: string,
  write: (w: SettingWrite) => Effect.Effect<void, SetError>
): Effect.Effect<void, SetError> =>
  Option.match(def.hooks.apply, {
    onNone: (): Effect.Effect<void, SetError> => Effect.void,
    onSome: (hook): Effect.Effect<void, SetError> =>
      Effect.gen(function* () {
        yield* guard(store, def.name);
        store.applying.push(def.name);
        yield* Effect.forEach(
          hook(value),
          (w) =>
            Effect.logDebug(`${def.name} -> ${w.setting}=${w.value}`).pipe(Effect.zipRight(write(w))),
          { discard: true }
        ).pipe(
          Effect.ensuring(
            Effect.sync(() => {
              store.applying.pop();
            })
          )
        );
      }),
  });
