"use strict";

import { LoremIpsum } from "lorem-ipsum";

/**
 * Source of pseudo-Latin filler text.
 */
interface TextSource {
  /** One capitalized sentence ending in punctuation. */
  sentence(): string;
  /** Several sentences separated by spaces. */
  paragraph(): string;
}

interface LoremSourceOptions {
  /** Uniform [0, 1) generator. Pass a fixed one for reproducible text. */
  random?: () => number;
}

function createLoremSource(options: LoremSourceOptions = {}): TextSource {
  const lorem = new LoremIpsum({
    sentencesPerParagraph: { min: 4, max: 8 },
    wordsPerSentence: { min: 4, max: 12 },
    random: options.random,
  });
  return {
    sentence: () => lorem.generateSentences(1),
    paragraph: () => lorem.generateParagraphs(1),
  };
}

const defaultTextSource: TextSource = createLoremSource();

export type { TextSource, LoremSourceOptions };
export { createLoremSource, defaultTextSource };
