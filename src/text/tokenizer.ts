import type { TokenizeOptions } from '../types/options.js';

/**
 * Word tokens: runs of letters, digits and combining marks, optionally joined
 * by single internal apostrophes or hyphens (don't, well-known, rock'n'roll).
 */
const WORD_PATTERN = /[\p{L}\p{N}\p{M}]+(?:['-][\p{L}\p{N}\p{M}]+)*/gu;

const APOSTROPHES = /[‘’ʼ]/g;
const DASHES = /[–—]/g;

// Split after terminal punctuation (plus any closing quotes or brackets) followed by whitespace
const SENTENCE_BREAK = /(?<=[.!?…]["'”’)\]]*)\s+/u;
const PARAGRAPH_BREAK = /\n\s*\n/;

export function normalizeText(text: string): string {
    return text
        .normalize('NFKC')
        .replace(APOSTROPHES, "'")
        .replace(DASHES, ' ');
}

export function tokenize(text: string, options: TokenizeOptions = {}): string[] {
    const lowercase = options.lowercase ?? true;
    const minLength = options.minTokenLength ?? 1;

    const normalized = normalizeText(text);
    const tokens: string[] = [];

    for (const match of normalized.matchAll(WORD_PATTERN)) {
        const word = lowercase ? match[0].toLowerCase() : match[0];
        if (word.length >= minLength) {
            tokens.push(word);
        }
    }
    return tokens;
}

export function splitSentences(text: string): string[] {
    const sentences: string[] = [];
    for (const block of text.replace(/\r\n?/g, '\n').split(PARAGRAPH_BREAK)) {
        for (const sentence of block.split(SENTENCE_BREAK)) {
            const trimmed = sentence.trim();
            if (trimmed) sentences.push(trimmed);
        }
    }
    return sentences;
}

/**
 * Tokenize text into the segments n-gram windows may slide over:
 * one per sentence, or a single segment when crossSentences is set.
 */
export function tokenizeSegments(text: string, options: TokenizeOptions = {}): string[][] {
    const segments = options.crossSentences ? [text] : splitSentences(text);
    return segments
        .map(segment => tokenize(segment, options))
        .filter(tokens => tokens.length > 0);
}
