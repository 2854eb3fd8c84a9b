// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * POSIX shell word splitting and quoting. Used for string `command` and
 * `entrypoint` values and for the free-form `--podman-*-args` flags.
 */

import { Array as Arr, Data, Match, Option, pipe } from "effect";

type Mode = Data.TaggedEnum<{
  Plain: object;
  Escape: object;
  Single: object;
  Double: object;
  DoubleEscape: object;
}>;

const { Plain, Escape, Single, Double, DoubleEscape } = Data.taggedEnum<Mode>();

interface LexState {
  readonly mode: Mode;
  /** None until a word has started; `''` starts an empty word. */
  readonly word: Option.Option<string>;
  readonly words: readonly string[];
}

const isBlank = (c: string): boolean => c === " " || c === "\t" || c === "\n" || c === "\r";

/** Characters a backslash escapes inside double quotes. */
const DOUBLE_QUOTE_ESCAPABLE: ReadonlySet<string> = new Set(["\\", '"', "$", "`", "\n"]);

const append = (state: LexState, text: string, mode: Mode): LexState => ({
  mode,
  word: Option.some(Option.getOrElse(state.word, () => "") + text),
  words: state.words,
});

const flush = (state: LexState): LexState => ({
  mode: Plain(),
  word: Option.none(),
  words: Option.match(state.word, {
    onNone: (): readonly string[] => state.words,
    onSome: (w): readonly string[] => [...state.words, w],
  }),
});

const step = (state: LexState, c: string): LexState =>
  pipe(
    Match.value(state.mode),
    Match.tag("Plain", (): LexState =>
      pipe(
        Match.value(c),
        Match.when(isBlank, (): LexState => flush(state)),
        Match.when("\\", (): LexState => ({ ...state, mode: Escape() })),
        Match.when("'", (): LexState => append(state, "", Single())),
        Match.when('"', (): LexState => append(state, "", Double())),
        Match.orElse((): LexState => append(state, c, Plain()))
      )
    ),
    // backslash-newline is a line continuation
    Match.tag("Escape", (): LexState =>
      c === "\n" ? { ...state, mode: Plain() } : append(state, c, Plain())
    ),
    Match.tag("Single", (): LexState =>
      c === "'" ? { ...state, mode: Plain() } : append(state, c, Single())
    ),
    Match.tag("Double", (): LexState =>
      pipe(
        Match.value(c),
        Match.when('"', (): LexState => ({ ...state, mode: Plain() })),
        Match.when("\\", (): LexState => ({ ...state, mode: DoubleEscape() })),
        Match.orElse((): LexState => append(state, c, Double()))
      )
    ),
    Match.tag("DoubleEscape", (): LexState =>
      DOUBLE_QUOTE_ESCAPABLE.has(c)
        ? append(state, c === "\n" ? "" : c, Double())
        : append(state, `\\${c}`, Double())
    ),
    Match.exhaustive
  );

/**
 * Split a command line into words. Returns None for an unterminated quote
 * or a trailing backslash.
 */
export const split = (input: string): Option.Option<readonly string[]> => {
  const initial: LexState = { mode: Plain(), word: Option.none(), words: [] };
  const final = Arr.reduce(Array.from(input), initial, step);
  return final.mode._tag === "Plain" ? Option.some(flush(final).words) : Option.none();
};

const SAFE_WORD = /^[\w@%+=:,./-]+$/;

/** Quote a word so the shell reads it back unchanged. */
export const quote = (word: string): string =>
  word === ""
    ? "''"
    : SAFE_WORD.test(word)
      ? word
      : `'${word.replaceAll("'", `'"'"'`)}'`;

export const join = (words: readonly string[]): string => words.map(quote).join(" ");
