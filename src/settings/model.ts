// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Data model of the settings engine: setting types, declarations, the
 * records held by a `ConfigStore`, and visibility conditions.
 */

import type { Option, Schema } from "effect";
import type { ComparisonOp, Origin, VisibilityMode } from "../config/field-values";

// ============================================================================
// Attributes
// ============================================================================

/**
 * Type-specific attributes as declared on a setting. Each setting type decodes
 * the fields it understands into its own typed struct.
 */
export interface SettingAttributes {
  readonly min?: number;
  readonly max?: number;
  readonly minLength?: number;
  readonly maxLength?: number;
  readonly pattern?: string;
  readonly options?: readonly string[];
}

export type AttributeKey = keyof SettingAttributes;

/** Read-only view of current values, handed to hints and cross-field validators. */
export type Lookup = (name: string) => Option.Option<string>;

export interface SettingWrite {
  readonly setting: string;
  readonly value: string;
}

// ============================================================================
// Setting types
// ============================================================================

/**
 * Behaviour shared by every setting of a kind. `attributes` decodes the
 * declared attributes once, at declaration; every other hook receives the
 * decoded struct.
 */
export interface SettingType<A, I = A> {
  readonly name: string;
  readonly attributes: Schema.Schema<A, I>;
  readonly validate: (value: string, attrs: A) => boolean;
  readonly errorMessage: (value: string, attrs: A) => string;
  readonly normalize?: (value: string) => string;
  readonly display?: (value: string) => string;
  readonly promptHint?: (attrs: A, lookup: Lookup) => string;
  /** Derived writes issued after a successful set. */
  readonly apply?: (value: string, attrs: A) => readonly SettingWrite[];
  /** Values are shown masked in menus and listings. */
  readonly masked?: boolean;
}

/** A setting type closed over one setting's decoded attributes. */
export interface BoundType {
  readonly typeName: string;
  readonly validate: (value: string) => boolean;
  readonly errorMessage: (value: string) => string;
  readonly normalize: (value: string) => string;
  readonly display: (value: string) => string;
  readonly promptHint: (lookup: Lookup) => string;
  readonly apply: Option.Option<(value: string) => readonly SettingWrite[]>;
  readonly masked: boolean;
}

// ============================================================================
// Visibility
// ============================================================================

export interface VisibilityCondition {
  readonly setting: string;
  readonly op: ComparisonOp;
  readonly operand: string;
}

export interface Visibility {
  readonly mode: VisibilityMode;
  readonly conditions: readonly VisibilityCondition[];
}

// ============================================================================
// Declarations
// ============================================================================

export interface SettingDecl extends SettingAttributes {
  readonly name: string;
  readonly type: string;
  readonly preset: string;
  readonly display?: string;
  readonly defaultValue?: string;
  readonly exportable?: boolean;
  readonly required?: boolean;
  /** `"SEPARATE_HOME==true"` strings or parsed conditions, all of which must hold. */
  readonly visibleAll?: ReadonlyArray<string | VisibilityCondition>;
  /** As `visibleAll`, but any one condition suffices. */
  readonly visibleAny?: ReadonlyArray<string | VisibilityCondition>;
}

/** Preset-level check over several settings; each returned message is one error. */
export type CrossValidator = (lookup: Lookup) => readonly string[];

export interface PresetDecl {
  readonly name: string;
  readonly display?: string;
  readonly priority?: number;
  readonly enabled?: boolean;
  readonly validate?: CrossValidator;
}

// ============================================================================
// Registry records
// ============================================================================

export interface SettingDef {
  readonly name: string;
  readonly type: string;
  readonly display: string;
  readonly preset: string;
  readonly exportable: boolean;
  readonly required: boolean;
  readonly attributes: SettingAttributes;
  readonly visibility: Visibility;
  readonly hooks: BoundType;
}

/** Current value of a setting; replaced as a whole on every write. */
export interface SettingState {
  readonly value: string;
  readonly origin: Origin;
  readonly defaultValue: string;
}

export interface Preset {
  readonly name: string;
  readonly display: string;
  readonly priority: number;
  readonly enabled: boolean;
  /** Registration index, the tie-breaker for equal priorities. */
  readonly order: number;
  readonly validate: Option.Option<CrossValidator>;
}
