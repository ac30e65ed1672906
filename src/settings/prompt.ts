// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Line-oriented terminal access for the interactive workflow. The live layer
 * sits on the platform `Terminal`; tests provide a scripted one.
 */

import { Terminal } from "@effect/platform";
import { Context, Effect, Layer } from "effect";
import { ErrorCode, PromptError } from "../lib/errors";

export interface Prompter {
  /** Print one line. */
  readonly say: (line: string) => Effect.Effect<void, PromptError>;
  /** Print `question` without a newline and read the answer, trimmed. */
  readonly ask: (question: string) => Effect.Effect<string, PromptError>;
}

export const Prompter: Context.Tag<Prompter, Prompter> = Context.GenericTag<Prompter>("dps/Prompter");

const aborted = (message: string): PromptError => new PromptError({ code: ErrorCode.ABORTED, message });

export const PrompterLive: Layer.Layer<Prompter, never, Terminal.Terminal> = Layer.effect(
  Prompter,
  Effect.gen(function* () {
    const terminal = yield* Terminal.Terminal;
    const display = (text: string): Effect.Effect<void, PromptError> =>
      terminal.display(text).pipe(Effect.mapError((e) => aborted(`Terminal write failed: ${e.message}`)));
    return {
      say: (line) => display(`${line}\n`),
      ask: (question) =>
        display(question).pipe(
          Effect.zipRight(terminal.readLine),
          Effect.catchTag("QuitException", () => Effect.fail(aborted("Aborted at prompt"))),
          Effect.map((answer) => answer.trim())
        ),
    };
  })
);

// ============================================================================
// Test Utilities
// ============================================================================

export interface ScriptedPrompter {
  readonly layer: Layer.Layer<Prompter>;
  /** Every line said and every question asked, in order. */
  readonly transcript: string[];
}

/**
 * Answers questions from `answers` in order. Running out of answers behaves
 * like Ctrl+D at the prompt.
 *
 * @example
 * ```typescript
 * const { layer, transcript } = makeScriptedPrompter(["1", "", "x"]);
 * await Effect.runPromise(runWorkflow(store).pipe(Effect.provide(layer)));
 * ```
 */
export const makeScriptedPrompter = (answers: readonly string[]): ScriptedPrompter => {
  const transcript: string[] = [];
  const queue = [...answers];
  const prompter: Prompter = {
    say: (line) =>
      Effect.sync(() => {
        transcript.push(line);
      }),
    ask: (question) =>
      Effect.suspend(() => {
        transcript.push(question);
        const answer = queue.shift();
        return answer === undefined ? Effect.fail(aborted("Input closed")) : Effect.succeed(answer.trim());
      }),
  };
  return { layer: Layer.succeed(Prompter, prompter), transcript };
};
