// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Settings registry. A `ConfigStore` is built once at startup from preset
 * and setting declarations, then mutated in place through `set` for the rest
 * of the process. Maps keep insertion order, which is the declaration order
 * every listing and export relies on.
 */

import { Array as Arr, Effect, Option, Order, pipe } from "effect";
import { APPLY_ORIGINS, type Origin } from "../config/field-values";
import {
  DuplicatePresetError,
  DuplicateSettingError,
  ErrorCode,
  InvalidConditionError,
  type RegistrationError,
  type SetError,
  UnknownPresetError,
  UnknownSettingError,
  ValidationError,
} from "../lib/errors";
import { withSettingLogs } from "../lib/log";
import { humanize } from "../lib/str";
import { dispatchApply } from "./apply";
import { type Catalog, bindSettingType } from "./catalog";
import type {
  AttributeKey,
  Lookup,
  Preset,
  PresetDecl,
  SettingAttributes,
  SettingDecl,
  SettingDef,
  SettingState,
  Visibility,
  VisibilityCondition,
} from "./model";
import { ALWAYS_VISIBLE, evaluate, parseCondition } from "./visibility";

export const DEFAULT_PRESET_PRIORITY = 50;

export const REQUIRED_MESSAGE = "A value is required";

export interface ConfigStore {
  readonly catalog: Catalog;
  readonly settings: Map<string, SettingDef>;
  readonly state: Map<string, SettingState>;
  readonly presets: Map<string, Preset>;
  /** Setting names per preset, in declaration order. */
  readonly members: Map<string, string[]>;
  /** Settings whose apply hooks are running, outermost first. */
  readonly applying: string[];
}

export const createStore = (catalog: Catalog): ConfigStore => ({
  catalog,
  settings: new Map(),
  state: new Map(),
  presets: new Map(),
  members: new Map(),
  applying: [],
});

// ============================================================================
// Lookup
// ============================================================================

const unknownSetting = (name: string): UnknownSettingError =>
  new UnknownSettingError({
    code: ErrorCode.SETTING_NOT_FOUND,
    setting: name,
    message: `Unknown setting: ${name}`,
  });

const unknownPreset = (name: string): UnknownPresetError =>
  new UnknownPresetError({
    code: ErrorCode.REGISTRATION_ERROR,
    preset: name,
    message: `Unknown preset: ${name}`,
  });

export const findSetting = (store: ConfigStore, name: string): Option.Option<SettingDef> =>
  Option.fromNullable(store.settings.get(name));

export const getDef = (store: ConfigStore, name: string): Effect.Effect<SettingDef, UnknownSettingError> =>
  pipe(
    findSetting(store, name),
    Option.match({
      onNone: (): Effect.Effect<SettingDef, UnknownSettingError> => Effect.fail(unknownSetting(name)),
      onSome: (def): Effect.Effect<SettingDef, UnknownSettingError> => Effect.succeed(def),
    })
  );

/** Every declared setting has state; the fallback only covers a foreign def. */
export const stateOf = (store: ConfigStore, name: string): SettingState =>
  store.state.get(name) ?? { value: "", origin: "default", defaultValue: "" };

export const lookup =
  (store: ConfigStore): Lookup =>
  (name) =>
    pipe(
      findSetting(store, name),
      Option.map(() => stateOf(store, name).value)
    );

export const get = (store: ConfigStore, name: string): Effect.Effect<string, UnknownSettingError> =>
  pipe(
    getDef(store, name),
    Effect.map(() => stateOf(store, name).value)
  );

export const getOrigin = (store: ConfigStore, name: string): Effect.Effect<Origin, UnknownSettingError> =>
  pipe(
    getDef(store, name),
    Effect.map(() => stateOf(store, name).origin)
  );

/** A declared attribute of a setting, `None` when the declaration left it out. */
export const getMeta = <K extends AttributeKey>(
  store: ConfigStore,
  name: string,
  key: K
): Effect.Effect<Option.Option<NonNullable<SettingAttributes[K]>>, UnknownSettingError> =>
  pipe(
    getDef(store, name),
    Effect.map((def) => Option.fromNullable(def.attributes[key]))
  );

/** Setting names in declaration order, optionally restricted to one preset. */
export const list = (store: ConfigStore, preset?: string): readonly string[] =>
  preset === undefined ? Array.from(store.settings.keys()) : (store.members.get(preset) ?? []);

const presetOrder: Order.Order<Preset> = Order.combine(
  Order.mapInput(Order.number, (p: Preset) => p.priority),
  Order.mapInput(Order.number, (p: Preset) => p.order)
);

/** Presets by priority, then registration order. */
export const listPresets = (
  store: ConfigStore,
  options: { readonly enabledOnly?: boolean } = {}
): readonly Preset[] =>
  pipe(
    Array.from(store.presets.values()),
    Arr.filter((p) => !options.enabledOnly || p.enabled),
    Arr.sort(presetOrder)
  );

export const getPreset = (store: ConfigStore, name: string): Effect.Effect<Preset, UnknownPresetError> =>
  pipe(
    Option.fromNullable(store.presets.get(name)),
    Option.match({
      onNone: (): Effect.Effect<Preset, UnknownPresetError> => Effect.fail(unknownPreset(name)),
      onSome: (p): Effect.Effect<Preset, UnknownPresetError> => Effect.succeed(p),
    })
  );

/** All settings, preset priority first and declaration order within a preset. */
export const orderedSettings = (store: ConfigStore): readonly SettingDef[] =>
  pipe(
    listPresets(store),
    Arr.flatMap((p) => list(store, p.name)),
    Arr.filterMap((name) => findSetting(store, name))
  );

/** Unknown settings are never visible. */
export const isVisible = (store: ConfigStore, name: string): boolean =>
  pipe(
    findSetting(store, name),
    Option.exists((def) => evaluate(def.visibility, lookup(store)))
  );

/** Menu rendering of the current value: masked for secrets, type display otherwise. */
export const displayValue = (store: ConfigStore, def: SettingDef): string => {
  const { value } = stateOf(store, def.name);
  return value === "" ? "" : def.hooks.display(value);
};

// ============================================================================
// Registration
// ============================================================================

export const createPreset = (
  store: ConfigStore,
  decl: PresetDecl
): Effect.Effect<Preset, DuplicatePresetError> =>
  Effect.gen(function* () {
    if (store.presets.has(decl.name)) {
      return yield* Effect.fail(
        new DuplicatePresetError({
          code: ErrorCode.REGISTRATION_ERROR,
          preset: decl.name,
          message: `Preset already exists: ${decl.name}`,
        })
      );
    }
    const preset: Preset = {
      name: decl.name,
      display: decl.display ?? humanize(decl.name),
      priority: decl.priority ?? DEFAULT_PRESET_PRIORITY,
      enabled: decl.enabled ?? true,
      order: store.presets.size,
      validate: Option.fromNullable(decl.validate),
    };
    store.presets.set(decl.name, preset);
    store.members.set(decl.name, []);
    return preset;
  });

const toCondition = (
  setting: string,
  c: string | VisibilityCondition
): Effect.Effect<VisibilityCondition, InvalidConditionError> =>
  typeof c !== "string"
    ? Effect.succeed(c)
    : pipe(
        parseCondition(c),
        Option.match({
          onSome: (parsed): Effect.Effect<VisibilityCondition, InvalidConditionError> =>
            Effect.succeed(parsed),
          onNone: (): Effect.Effect<VisibilityCondition, InvalidConditionError> =>
            Effect.fail(
              new InvalidConditionError({
                code: ErrorCode.REGISTRATION_ERROR,
                setting,
                condition: c,
                message: `Setting ${setting} has an invalid visibility condition: '${c}'`,
              })
            ),
        })
      );

/** Conditions may only reference settings declared before this one. */
const buildVisibility = (
  store: ConfigStore,
  decl: SettingDecl
): Effect.Effect<Visibility, InvalidConditionError | UnknownSettingError> =>
  Effect.gen(function* () {
    if (decl.visibleAll !== undefined && decl.visibleAny !== undefined) {
      return yield* Effect.fail(
        new InvalidConditionError({
          code: ErrorCode.REGISTRATION_ERROR,
          setting: decl.name,
          condition: "",
          message: `Setting ${decl.name} declares both visibleAll and visibleAny`,
        })
      );
    }
    const mode = decl.visibleAny !== undefined ? "any" : "all";
    const raw = decl.visibleAny ?? decl.visibleAll ?? [];
    if (raw.length === 0) {
      return ALWAYS_VISIBLE;
    }
    const conditions = yield* Effect.forEach(raw, (c) => toCondition(decl.name, c));
    yield* Effect.forEach(
      conditions,
      (c) =>
        store.settings.has(c.setting)
          ? Effect.void
          : Effect.fail(
              new UnknownSettingError({
                code: ErrorCode.SETTING_NOT_FOUND,
                setting: c.setting,
                message: `Setting ${decl.name} is visible on ${c.setting}, which is not declared before it`,
              })
            ),
      { discard: true }
    );
    return { mode, conditions };
  });

const attributesOf = (decl: SettingDecl): SettingAttributes => ({
  ...(decl.min !== undefined ? { min: decl.min } : {}),
  ...(decl.max !== undefined ? { max: decl.max } : {}),
  ...(decl.minLength !== undefined ? { minLength: decl.minLength } : {}),
  ...(decl.maxLength !== undefined ? { maxLength: decl.maxLength } : {}),
  ...(decl.pattern !== undefined ? { pattern: decl.pattern } : {}),
  ...(decl.options !== undefined ? { options: decl.options } : {}),
});

export const createSetting = (
  store: ConfigStore,
  decl: SettingDecl
): Effect.Effect<SettingDef, RegistrationError> =>
  Effect.gen(function* () {
    if (store.settings.has(decl.name)) {
      return yield* Effect.fail(
        new DuplicateSettingError({
          code: ErrorCode.REGISTRATION_ERROR,
          setting: decl.name,
          message: `Setting already exists: ${decl.name}`,
        })
      );
    }
    const members = yield* pipe(
      Option.fromNullable(store.members.get(decl.preset)),
      Option.match({
        onNone: (): Effect.Effect<string[], UnknownPresetError> => Effect.fail(unknownPreset(decl.preset)),
        onSome: (m): Effect.Effect<string[], UnknownPresetError> => Effect.succeed(m),
      })
    );
    const attributes = attributesOf(decl);
    const hooks = yield* bindSettingType(store.catalog, decl.name, decl.type, attributes);
    const visibility = yield* buildVisibility(store, decl);

    const def: SettingDef = {
      name: decl.name,
      type: decl.type,
      display: decl.display ?? humanize(decl.name.toLowerCase()),
      preset: decl.preset,
      exportable: decl.exportable ?? true,
      required: decl.required ?? false,
      attributes,
      visibility,
      hooks,
    };
    const rawDefault = decl.defaultValue ?? "";
    const defaultValue = rawDefault === "" ? "" : hooks.normalize(rawDefault);

    store.settings.set(def.name, def);
    store.state.set(def.name, { value: defaultValue, origin: "default", defaultValue });
    members.push(def.name);
    return def;
  });

// ============================================================================
// Writes
// ============================================================================

export const normalizeValue = (def: SettingDef, value: string): string =>
  value === "" ? "" : def.hooks.normalize(value);

/**
 * Type-level check of an already normalized value. Empty values pass unless
 * the setting is required. Visibility is not consulted here.
 */
export const checkValue = (def: SettingDef, value: string): Option.Option<string> =>
  value === ""
    ? def.required
      ? Option.some(REQUIRED_MESSAGE)
      : Option.none()
    : def.hooks.validate(value)
      ? Option.none()
      : Option.some(def.hooks.errorMessage(value));

const logValue = (def: SettingDef, value: string, origin: Origin): Effect.Effect<void> =>
  Effect.logDebug(`set to ${def.hooks.masked ? "<hidden>" : value} (${origin})`);

/**
 * Normalize, validate, store, then run the type's apply hook. Hooks fire for
 * `env`, `prompt` and `manual` writes and for every write inside a running
 * cascade; their own writes carry origin `auto`.
 */
export const set = (
  store: ConfigStore,
  name: string,
  value: string,
  origin: Origin
): Effect.Effect<void, SetError> =>
  Effect.gen(function* () {
    const def = yield* getDef(store, name);
    const normalized = normalizeValue(def, value);
    yield* Option.match(checkValue(def, normalized), {
      onNone: (): Effect.Effect<void> => Effect.void,
      onSome: (message): Effect.Effect<void, ValidationError> =>
        Effect.fail(
          new ValidationError({
            code: ErrorCode.CONFIG_VALIDATION_ERROR,
            setting: name,
            value: normalized,
            message,
          })
        ),
    });

    const snapshot = new Map(store.state);
    store.state.set(name, { ...stateOf(store, name), value: normalized, origin });
    yield* logValue(def, normalized, origin);

    if (APPLY_ORIGINS.has(origin) || store.applying.length > 0) {
      // A failed cascade leaves neither this value nor any derived write behind
      yield* dispatchApply(store, def, normalized, (write) =>
        set(store, write.setting, write.value, "auto")
      ).pipe(Effect.tapError(() => Effect.sync(() => restoreState(store, snapshot))));
    }
  }).pipe(withSettingLogs(name));

const restoreState = (store: ConfigStore, snapshot: ReadonlyMap<string, SettingState>): void => {
  store.state.clear();
  for (const [name, state] of snapshot) {
    store.state.set(name, state);
  }
};

/** Message for a failed `set`, naming the derived setting when a cascade failed. */
export const setFailureMessage = (name: string, error: ValidationError): string =>
  error.setting === name ? error.message : `${error.setting}: ${error.message}`;

/**
 * Store a value without validation or apply hooks. The environment importer
 * keeps invalid overrides this way so they surface at the next validation.
 */
export const assign = (
  store: ConfigStore,
  name: string,
  value: string,
  origin: Origin
): Effect.Effect<void, UnknownSettingError> =>
  pipe(
    getDef(store, name),
    Effect.map((def) => {
      store.state.set(name, { ...stateOf(store, name), value: normalizeValue(def, value), origin });
    })
  );

/**
 * Replace a setting's default (site defaults from dps.toml). A setting still
 * at its default takes the new value; origin stays `default`.
 */
export const setDefault = (
  store: ConfigStore,
  name: string,
  value: string
): Effect.Effect<void, ValidationError | UnknownSettingError> =>
  Effect.gen(function* () {
    const def = yield* getDef(store, name);
    const normalized = normalizeValue(def, value);
    yield* Option.match(checkValue(def, normalized), {
      onNone: (): Effect.Effect<void> => Effect.void,
      onSome: (message): Effect.Effect<void, ValidationError> =>
        Effect.fail(
          new ValidationError({
            code: ErrorCode.CONFIG_VALIDATION_ERROR,
            setting: name,
            value: normalized,
            message: `Invalid default: ${message}`,
          })
        ),
    });
    const current = stateOf(store, name);
    store.state.set(name, {
      value: current.origin === "default" ? normalized : current.value,
      origin: current.origin,
      defaultValue: normalized,
    });
  });
