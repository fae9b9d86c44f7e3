/**
 * Shared corpora for pipeline and handler tests.
 */

/** Ten tokens, recurs in three generated documents and never in the reference */
export const NEW_PROVERB = 'every like is a loan against your future attention span';

/** Eleven tokens, recurs in three generated documents and once in the reference */
export const OLD_PROVERB = 'a stitch in time saves nine even when you post online';

export const GENERATED = [
    'Every like is a loan against your future attention span.',
    'Remember that every like is a loan against your future attention span.',
    'Truly every like is a loan against your future attention span.',
    'A stitch in time saves nine, even when you post online.',
    'A stitch in time saves nine, even when you post online.',
    'A stitch in time saves nine, even when you post online.',
];

export const REFERENCE = [
    'A stitch in time saves nine, even when you post online.',
    'Nothing here.',
];
