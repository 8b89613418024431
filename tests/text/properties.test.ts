import { describe, expect, it } from "@jest/globals";

import { configure, type WrapOptions } from "../../src/text/index.js";

const PIECES = ["a", "b", "∀", "Ḃ", "😀", " ", " ", "\t", "\n", "\r\n", "  "];

/** Deterministic linear congruential generator. */
function createRandom(seed: number): (limit: number) => number {
  let state = seed >>> 0;
  return (limit) => {
    state = (Math.imul(state, 1664525) + 1013904223) >>> 0;
    return state % limit;
  };
}

function randomText(random: (limit: number) => number, length: number): string {
  let text = "";
  for (let index = 0; index < length; index += 1) {
    const piece = PIECES[random(PIECES.length)] ?? "a";
    text += random(4) === 0 ? piece.repeat(random(20) + 1) : piece;
  }
  return text;
}

function runeLength(text: string): number {
  return Array.from(text).length;
}

function splitBytes(
  bytes: Uint8Array,
  random: (limit: number) => number,
): Uint8Array[] {
  const chunks: Uint8Array[] = [];
  let offset = 0;
  while (offset < bytes.length) {
    const size = random(7) + 1;
    chunks.push(bytes.subarray(offset, offset + size));
    offset += size;
  }
  return chunks;
}

const CONFIGS: WrapOptions[] = [
  { columnWidth: 30 },
  { columnWidth: 7, tabstopWidth: 2 },
  { columnWidth: 12, firstRowIndent: "----", subsequentRowIndent: "  " },
  { columnWidth: 5, subsequentRowIndent: "😀", lineSeparator: "\r\n" },
  { columnWidth: 9, foldLineBreaks: false, subsequentRowIndent: ">" },
];

describe("wrapping invariants", () => {
  const random = createRandom(42);
  const samples = Array.from({ length: 25 }, () => randomText(random, 60));

  for (const options of CONFIGS) {
    const wrapper = configure(options);
    const separator = wrapper.config.lineSeparator;
    const firstIndent = wrapper.config.firstRowIndent.join("");
    const indent = wrapper.config.subsequentRowIndent.join("");

    it(`keeps every line within ${wrapper.config.columnWidth} columns`, () => {
      for (const sample of samples) {
        for (const line of wrapper.wrapText(sample).split(separator)) {
          expect(runeLength(line)).toBeLessThanOrEqual(
            wrapper.config.columnWidth,
          );
        }
      }
    });

    it(`starts every line with its indent and then content (${JSON.stringify(options)})`, () => {
      for (const sample of samples) {
        const output = wrapper.wrapText(sample);
        if (output.length === 0) {
          continue;
        }

        output.split(separator).forEach((line, index) => {
          if (line.length === 0) {
            return;
          }
          const expectedIndent = index === 0 ? firstIndent : indent;
          expect(line.startsWith(expectedIndent)).toBe(true);
          expect(line.slice(expectedIndent.length)).toMatch(/^\S/u);
        });
      }
    });
  }

  it("splits an unbreakable word into fragments of the width after the indent", () => {
    const wrapper = configure({ columnWidth: 12, subsequentRowIndent: "  " });

    expect(wrapper.wrapText("x".repeat(50)).split("\n")).toEqual([
      "x".repeat(12),
      `  ${"x".repeat(10)}`,
      `  ${"x".repeat(10)}`,
      `  ${"x".repeat(10)}`,
      `  ${"x".repeat(8)}`,
    ]);
  });

  it("reproduces the same wrap points when re-wrapping its own output", () => {
    const options: WrapOptions = {
      columnWidth: 16,
      firstRowIndent: "* ",
      subsequentRowIndent: "  ",
    };
    const wrapper = configure(options);
    const words = Array.from({ length: 40 }, (_, index) =>
      Array.from("∀bc😀".repeat(2))
        .slice(0, (index % 7) + 1)
        .join(""),
    );

    const wrapped = wrapper.wrapText(words.join(" "));
    const unwrapped = wrapped.slice(2).split("\n  ").join(" ");

    expect(wrapper.wrapText(unwrapped)).toBe(wrapped);
  });
});

describe("streaming and bulk equivalence", () => {
  const samples = [
    "This is   a simple \t\n bit of text including non-latin Ḃ\t   \n characters Ϟ",
    "∀∁∂∃ ∄ ∅∆∇\t ∈∉∊  \r    ∋∌∍∎∏ +   -∀∁∂∃ 😀😀😀😀😀😀😀😀 ∈∉∊\r\n\r\nend",
  ];

  for (const options of CONFIGS) {
    const wrapper = configure(options);

    it(`matches wrapText for every two-chunk split (${JSON.stringify(options)})`, async () => {
      for (const sample of samples) {
        const expected = wrapper.wrapText(sample);
        const bytes = Buffer.from(sample);

        for (let split = 0; split <= bytes.length; split += 1) {
          const chunks = [bytes.subarray(0, split), bytes.subarray(split)];
          await expect(wrapper.wrapFromStream(chunks)).resolves.toBe(expected);
        }
      }
    });

    it(`matches wrapText for random and single-byte chunking (${JSON.stringify(options)})`, async () => {
      const random = createRandom(7);
      for (const sample of samples) {
        const expected = wrapper.wrapText(sample);
        const bytes = Buffer.from(sample);

        await expect(
          wrapper.wrapFromStream(splitBytes(bytes, random)),
        ).resolves.toBe(expected);

        const singleBytes = Array.from(bytes, (byte) => Uint8Array.of(byte));
        await expect(wrapper.wrapFromStream(singleBytes)).resolves.toBe(
          expected,
        );
      }
    });
  }
});
