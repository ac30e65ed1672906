// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Setting type catalog. A type's attribute struct is decoded once per
 * setting, when the setting is declared; the resulting `BoundType` closes
 * over it, so validation and display never look anything up by name.
 */

import { Either, Option, pipe } from "effect";
import { ErrorCode, MissingAttributeError, UnknownTypeError } from "../lib/errors";
import { decodeEither } from "../lib/schema-utils";
import type { BoundType, SettingAttributes, SettingType, SettingWrite } from "./model";

/** Type-erased entry: only the binder needs to know the attribute type. */
interface TypeBinder {
  readonly name: string;
  readonly bind: (attrs: SettingAttributes) => Either.Either<BoundType, string>;
}

export interface Catalog {
  readonly types: Map<string, TypeBinder>;
}

export const createCatalog = (): Catalog => ({ types: new Map() });

const identity = (value: string): string => value;

/** Decode `raw` with the type's attribute schema and close every hook over it. */
export const bindType = <A, I>(
  type: SettingType<A, I>,
  raw: SettingAttributes
): Either.Either<BoundType, string> =>
  pipe(
    decodeEither(type.attributes, raw),
    Either.map(
      (attrs): BoundType => ({
        typeName: type.name,
        validate: (value): boolean => type.validate(value, attrs),
        errorMessage: (value): string => type.errorMessage(value, attrs),
        normalize: type.normalize ?? identity,
        display: type.display ?? identity,
        promptHint: (lookup): string => type.promptHint?.(attrs, lookup) ?? "",
        apply: pipe(
          Option.fromNullable(type.apply),
          Option.map(
            (apply) =>
              (value: string): readonly SettingWrite[] =>
                apply(value, attrs)
          )
        ),
        masked: type.masked ?? false,
      })
    )
  );

/** Registering a name twice replaces the earlier type. */
export const registerType = <A, I>(catalog: Catalog, type: SettingType<A, I>): void => {
  catalog.types.set(type.name, {
    name: type.name,
    bind: (raw) => bindType(type, raw),
  });
};

export const hasType = (catalog: Catalog, name: string): boolean => catalog.types.has(name);

export const listTypes = (catalog: Catalog): readonly string[] => Array.from(catalog.types.keys());

/** Resolve `typeName` and bind it to the attributes declared on `setting`. */
export const bindSettingType = (
  catalog: Catalog,
  setting: string,
  typeName: string,
  raw: SettingAttributes
): Either.Either<BoundType, UnknownTypeError | MissingAttributeError> =>
  pipe(
    Option.fromNullable(catalog.types.get(typeName)),
    Either.fromOption(
      () =>
        new UnknownTypeError({
          code: ErrorCode.REGISTRATION_ERROR,
          type: typeName,
          message: `Setting ${setting} uses unknown type '${typeName}'`,
        })
    ),
    Either.flatMap((binder) =>
      pipe(
        binder.bind(raw),
        Either.mapLeft(
          (detail) =>
            new MissingAttributeError({
              code: ErrorCode.REGISTRATION_ERROR,
              setting,
              type: typeName,
              message: `Setting ${setting} (${typeName}) has invalid attributes:\n${detail}`,
            })
        )
      )
    )
  );
