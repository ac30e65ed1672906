// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Test helpers for providing Effect layers in tests. The file system is an
 * in-memory map behind the platform `FileSystem` interface, so nothing
 * touches the disk.
 */

import { FileSystem } from "@effect/platform";
import { SystemError } from "@effect/platform/Error";
import { Cause, Effect, Exit, Layer, Logger, Option } from "effect";

/** Files keyed by path; writes land in the same map. */
export const memoryFileSystem = (files: Map<string, string>): Layer.Layer<FileSystem.FileSystem> =>
  FileSystem.layerNoop({
    exists: (path) => Effect.succeed(files.has(path)),
    readFileString: (path) =>
      Option.match(Option.fromNullable(files.get(path)), {
        onNone: () =>
          Effect.fail(
            new SystemError({
              module: "FileSystem",
              method: "readFileString",
              reason: "NotFound",
              pathOrDescriptor: path,
            })
          ),
        onSome: (content) => Effect.succeed(content),
      }),
    writeFileString: (path, data) =>
      Effect.sync(() => {
        files.set(path, data);
      }),
  });

/** Drops log output so test runs stay quiet. */
export const SilentLogger: Layer.Layer<never> = Logger.replace(Logger.defaultLogger, Logger.none);

/**
 * Run an effect with the in-memory file system and no log output.
 */
export const runTest = <A, E>(
  effect: Effect.Effect<A, E, FileSystem.FileSystem>,
  files: Map<string, string> = new Map()
): Promise<A> =>
  Effect.runPromise(effect.pipe(Effect.provide(Layer.merge(memoryFileSystem(files), SilentLogger))));

/**
 * Run an effect and return the Exit value.
 */
export const runTestExit = <A, E>(
  effect: Effect.Effect<A, E, FileSystem.FileSystem>,
  files: Map<string, string> = new Map()
): Promise<Exit.Exit<A, E>> =>
  Effect.runPromiseExit(effect.pipe(Effect.provide(Layer.merge(memoryFileSystem(files), SilentLogger))));

/** Synchronous run for effects with no requirements, logs silenced. */
export const runQuiet = <A, E>(effect: Effect.Effect<A, E>): A =>
  Effect.runSync(effect.pipe(Effect.provide(SilentLogger)));

export const runQuietExit = <A, E>(effect: Effect.Effect<A, E>): Exit.Exit<A, E> =>
  Effect.runSyncExit(effect.pipe(Effect.provide(SilentLogger)));

/** The typed failure of an exit, `None` on success or defect. */
export const failureOf = <A, E>(exit: Exit.Exit<A, E>): Option.Option<E> =>
  Exit.isFailure(exit) ? Cause.failureOption(exit.cause) : Option.none();
