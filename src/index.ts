#!/usr/bin/env node
// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * dps-config - installer settings configurator
 *
 * Main entry point for the CLI application.
 * This is the "imperative shell" - the only place where Effect runtime is executed.
 */

import { NodeContext } from "@effect/platform-node";
import { Cause, Effect, Exit, Match, Option, pipe } from "effect";
import { cli, isAppError } from "./cli/index";
import { toExitCode } from "./lib/errors";

const exitCodeFromExit = (exit: Exit.Exit<void, unknown>): number =>
  Exit.match(exit, {
    onSuccess: (): number => 0,
    onFailure: (cause): number =>
      Option.match(Cause.failureOption(cause), {
        onNone: (): number => 1,
        onSome: (value: unknown): number =>
          pipe(
            Match.value(value),
            Match.when(isAppError, (e) => toExitCode(e.code)),
            Match.orElse(() => 1)
          ),
      }),
  });

/** App errors were already shown by the command runner; this covers defects and argument errors. */
const logExitError = (exit: Exit.Exit<void, unknown>): void =>
  Exit.match(exit, {
    onSuccess: (): void => undefined,
    onFailure: (cause): void =>
      Option.match(Cause.failureOption(cause), {
        onNone: (): void => {
          if (!Cause.isInterruptedOnly(cause)) {
            console.error("Unexpected error:", Cause.pretty(cause));
          }
        },
        onSome: (err: unknown): void =>
          pipe(
            Match.value(err),
            Match.when(isAppError, () => undefined),
            Match.when(
              (v: unknown): v is { message: string } =>
                typeof v === "object" && v !== null && "message" in v && typeof v.message === "string",
              (v: { message: string }) => console.error(`Error: ${v.message}`)
            ),
            Match.orElse(() => undefined)
          ),
      }),
  });

async function main(): Promise<never> {
  const exit = await Effect.runPromiseExit(pipe(cli(process.argv), Effect.provide(NodeContext.layer)));
  logExitError(exit);
  process.exit(exitCodeFromExit(exit));
}

// Only run if this is the main entry point
if (require.main === module) {
  void main();
}
