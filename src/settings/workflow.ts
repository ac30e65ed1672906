// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Interactive confirmation workflow.
 *
 * Validating -> PromptErrorsOnly (until clean) -> MenuDisplay <-> PresetEditLoop
 * -> Confirming -> Confirmed. Q at the menu, or Ctrl+C/Ctrl+D at any prompt,
 * ends in Aborted. Each state is handled by `step`, which returns the next one.
 */

import { Data, Effect, Option, pipe } from "effect";
import type { ApplyCycleError, PromptError, UnknownPresetError, UnknownSettingError } from "../lib/errors";
import { parseNat } from "../lib/schema-utils";
import type { Preset, SettingDef } from "./model";
import { Prompter } from "./prompt";
import {
  type ConfigStore,
  displayValue,
  findSetting,
  getPreset,
  isVisible,
  list,
  listPresets,
  lookup,
  set,
  setFailureMessage,
} from "./store";
import {
  type ValidationReport,
  failingCrossFieldPresets,
  failingSettings,
  issueLine,
  validateAll,
  validatePreset,
} from "./validation";

export type WorkflowState = Data.TaggedEnum<{
  Validating: {};
  PromptErrorsOnly: { readonly report: ValidationReport };
  MenuDisplay: { readonly status: string };
  PresetEditLoop: { readonly preset: string };
  Confirming: {};
  Confirmed: {};
  Aborted: { readonly reason: string };
}>;

export const WorkflowState = Data.taggedEnum<WorkflowState>();

export type WorkflowError = UnknownSettingError | UnknownPresetError | ApplyCycleError;

export interface WorkflowOptions {
  /** Presets to walk through; every enabled preset when absent. */
  readonly presets?: readonly string[];
  /** Confirm from the menu without reading a key, as long as nothing is invalid. */
  readonly autoConfirm?: boolean;
}

export const isTerminal = (state: WorkflowState): boolean =>
  state._tag === "Confirmed" || state._tag === "Aborted";

export const CONFIRM_WARNING = "Configuration has errors. Fix before proceeding.";

const header = (title: string): string => `=== ${title} ===`;

const workflowPresets = (store: ConfigStore, options: WorkflowOptions): readonly Preset[] =>
  options.presets === undefined
    ? listPresets(store, { enabledOnly: true })
    : listPresets(store).filter((p) => options.presets?.includes(p.name) ?? false);

// ============================================================================
// Prompting
// ============================================================================

const question = (store: ConfigStore, def: SettingDef): string => {
  const hint = def.hooks.promptHint(lookup(store));
  const current = displayValue(store, def);
  const label = hint === "" ? def.display : `${def.display} ${hint}`;
  return current === "" ? `  ${label}: ` : `  ${label} [${current}]: `;
};

/** Ask until the answer is accepted or left blank, which keeps the current value. */
export const promptSetting = (
  store: ConfigStore,
  def: SettingDef
): Effect.Effect<void, PromptError | WorkflowError, Prompter> =>
  Effect.gen(function* () {
    const prompter = yield* Prompter;
    const before = displayValue(store, def);
    const answer = yield* prompter.ask(question(store, def));
    if (answer === "") {
      return;
    }
    yield* pipe(
      set(store, def.name, answer, "prompt"),
      Effect.zipRight(
        Effect.suspend(() => {
          const after = displayValue(store, def);
          return after === before
            ? Effect.void
            : prompter.say(before === "" ? `    -> Set: ${after}` : `    -> Updated: ${before} -> ${after}`);
        })
      ),
      Effect.catchTag("ValidationError", (e) =>
        pipe(
          prompter.say(`    Error: ${setFailureMessage(def.name, e)}`),
          Effect.zipRight(promptSetting(store, def))
        )
      )
    );
  });

/** Visibility is re-checked before every setting, since earlier answers can change it. */
const promptVisible = (
  store: ConfigStore,
  names: readonly string[]
): Effect.Effect<void, PromptError | WorkflowError, Prompter> =>
  Effect.forEach(
    names,
    (name) =>
      Option.match(findSetting(store, name), {
        onNone: () => Effect.void,
        onSome: (def) => (isVisible(store, name) ? promptSetting(store, def) : Effect.void),
      }),
    { discard: true }
  );

const presetSummary = (store: ConfigStore, preset: Preset, index: number): readonly string[] => [
  `${index}. ${preset.display} Configuration:`,
  ...list(store, preset.name).flatMap((name) =>
    Option.match(findSetting(store, name), {
      onNone: (): readonly string[] => [],
      onSome: (def): readonly string[] =>
        isVisible(store, name) ? [`   > ${def.display}: ${displayValue(store, def)}`] : [],
    })
  ),
  "",
];

// ============================================================================
// States
// ============================================================================

const validating = (
  store: ConfigStore,
  options: WorkflowOptions
): Effect.Effect<WorkflowState, WorkflowError> =>
  pipe(
    validateAll(
      store,
      workflowPresets(store, options).map((p) => p.name)
    ),
    Effect.map((report) =>
      report.issues > 0 ? WorkflowState.PromptErrorsOnly({ report }) : WorkflowState.MenuDisplay({ status: "" })
    )
  );

const promptErrorsOnly = (
  store: ConfigStore,
  report: ValidationReport
): Effect.Effect<WorkflowState, PromptError | WorkflowError, Prompter> =>
  Effect.gen(function* () {
    const prompter = yield* Prompter;
    yield* prompter.say(header("Configuration Required"));
    for (const line of report.presets.flatMap((p) => p.errors).map(issueLine)) {
      yield* prompter.say(`  ! ${line}`);
    }
    yield* promptVisible(store, failingSettings(report));
    for (const preset of failingCrossFieldPresets(report)) {
      yield* promptVisible(store, list(store, preset));
    }
    return WorkflowState.Validating();
  });

const MENU_KEYS = { confirm: "x", quit: "q" } as const;

const menuDisplay = (
  store: ConfigStore,
  options: WorkflowOptions,
  state: Data.TaggedEnum.Value<WorkflowState, "MenuDisplay">
): Effect.Effect<WorkflowState, PromptError, Prompter> =>
  Effect.gen(function* () {
    const prompter = yield* Prompter;
    const presets = workflowPresets(store, options);
    yield* prompter.say(header("Configuration Menu"));
    if (state.status !== "") {
      yield* prompter.say(state.status);
    }
    for (const [i, preset] of presets.entries()) {
      for (const line of presetSummary(store, preset, i + 1)) {
        yield* prompter.say(line);
      }
    }
    if (options.autoConfirm && state.status === "") {
      yield* prompter.say("Auto-confirming configuration");
      return WorkflowState.Confirming();
    }

    const key = (yield* prompter.ask(`Select preset (1-${presets.length}, X to proceed, Q to quit): `)).toLowerCase();
    if (key === MENU_KEYS.confirm) {
      return WorkflowState.Confirming();
    }
    if (key === MENU_KEYS.quit) {
      return WorkflowState.Aborted({ reason: "Aborted from menu" });
    }
    const selected = pipe(
      parseNat(key),
      Option.flatMap((n) => Option.fromNullable(presets[n - 1]))
    );
    if (Option.isSome(selected)) {
      return WorkflowState.PresetEditLoop({ preset: selected.value.name });
    }
    if (key !== "") {
      yield* prompter.say(`Invalid selection: ${key}`);
    }
    return state;
  });

const presetEditLoop = (
  store: ConfigStore,
  preset: string
): Effect.Effect<WorkflowState, PromptError | WorkflowError, Prompter> =>
  Effect.gen(function* () {
    const prompter = yield* Prompter;
    const { display } = yield* getPreset(store, preset);
    yield* prompter.say(header(`${display} Configuration`));
    yield* prompter.say(" Press ENTER to keep current value, or type new value");
    yield* promptVisible(store, list(store, preset));

    const report = yield* validatePreset(store, preset);
    if (report.issues === 0) {
      return WorkflowState.MenuDisplay({ status: `${display} updated` });
    }
    for (const issue of report.errors) {
      yield* prompter.say(`  ! ${issueLine(issue)}`);
    }
    return WorkflowState.PresetEditLoop({ preset });
  });

const confirming = (
  store: ConfigStore,
  options: WorkflowOptions
): Effect.Effect<WorkflowState, PromptError | WorkflowError, Prompter> =>
  Effect.gen(function* () {
    const report = yield* validateAll(
      store,
      workflowPresets(store, options).map((p) => p.name)
    );
    if (report.issues > 0) {
      return WorkflowState.MenuDisplay({ status: CONFIRM_WARNING });
    }
    const prompter = yield* Prompter;
    yield* prompter.say("Configuration confirmed");
    return WorkflowState.Confirmed();
  });

const dispatch = (
  store: ConfigStore,
  options: WorkflowOptions,
  state: WorkflowState
): Effect.Effect<WorkflowState, PromptError | WorkflowError, Prompter> =>
  WorkflowState.$match(state, {
    Validating: () => validating(store, options),
    PromptErrorsOnly: ({ report }) => promptErrorsOnly(store, report),
    MenuDisplay: (s) => menuDisplay(store, options, s),
    PresetEditLoop: ({ preset }) => presetEditLoop(store, preset),
    Confirming: () => confirming(store, options),
    Confirmed: (s) => Effect.succeed<WorkflowState>(s),
    Aborted: (s) => Effect.succeed<WorkflowState>(s),
  });

/** One transition. A prompt closed by the user turns into `Aborted`. */
export const step =
  (store: ConfigStore, options: WorkflowOptions = {}) =>
  (state: WorkflowState): Effect.Effect<WorkflowState, WorkflowError, Prompter> =>
    pipe(
      dispatch(store, options, state),
      Effect.catchTag("PromptError", (e) => Effect.succeed(WorkflowState.Aborted({ reason: e.message })))
    );

const initialState: WorkflowState = WorkflowState.Validating();

/** Run from `Validating` until `Confirmed` or `Aborted`. */
export const runWorkflow = (
  store: ConfigStore,
  options: WorkflowOptions = {}
): Effect.Effect<WorkflowState, WorkflowError, Prompter> =>
  Effect.iterate(initialState, {
    while: (state) => !isTerminal(state),
    body: step(store, options),
  }).pipe(
    Effect.tap((state) =>
      state._tag === "Aborted" ? Effect.logDebug(`Workflow aborted: ${state.reason}`) : Effect.void
    )
  );
