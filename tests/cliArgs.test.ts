import { intOption, listOption, numberOption, parseCliArgs, stringOption } from '../src/cliArgs.js';
import { TrawlException } from '../src/types/errors.js';

describe('parseCliArgs', () => {
    test('splits command, files, options and switches', () => {
        const args = parseCliArgs(['run', 'a.txt', 'b.txt', '--min-count', '4', '--json', '-o', 'report.json']);

        expect(args.command).toBe('run');
        expect(args.positionals).toEqual(['a.txt', 'b.txt']);
        expect(args.options.get('min-count')).toEqual(['4']);
        expect(args.options.get('out')).toEqual(['report.json']);
        expect([...args.switches]).toEqual(['json']);
    });

    test('accepts --flag=value and repeated flags', () => {
        const args = parseCliArgs(['run', '--reference=a.txt', '-r', 'b.txt,c.txt']);
        expect(args.options.get('reference')).toEqual(['a.txt', 'b.txt,c.txt']);
        expect(listOption(args, 'reference')).toEqual(['a.txt', 'b.txt', 'c.txt']);
    });

    test('--reference takes every file up to the next flag', () => {
        const args = parseCliArgs(['run', 'g.txt', '--reference', 'a.txt', 'b.txt', '--limit', '5', 'c.txt']);
        expect(args.positionals).toEqual(['g.txt', 'c.txt']);
        expect(listOption(args, 'reference')).toEqual(['a.txt', 'b.txt']);
        expect(stringOption(args, 'limit')).toBe('5');
    });

    test('treats everything after -- as files', () => {
        const args = parseCliArgs(['ngrams', '--', '--odd-name.txt']);
        expect(args.positionals).toEqual(['--odd-name.txt']);
    });

    test('expands short aliases for switches', () => {
        const args = parseCliArgs(['-h']);
        expect(args.command).toBeUndefined();
        expect(args.switches.has('help')).toBe(true);
    });

    test('rejects a value flag without a value', () => {
        expect(() => parseCliArgs(['run', '--limit'])).toThrow(TrawlException);
        expect(() => parseCliArgs(['run', '--limit', '--json'])).toThrow(/--limit/);
    });

    test('rejects a value given to a switch', () => {
        expect(() => parseCliArgs(['run', '--json=yes'])).toThrow(/--json/);
    });
});

describe('option helpers', () => {
    const args = parseCliArgs(['run', '--limit', '5', '--limit', '7', '--smoothing', '0.5', '--bad', 'x']);

    test('last value wins', () => {
        expect(stringOption(args, 'limit')).toBe('7');
        expect(stringOption(args, 'missing')).toBeUndefined();
    });

    test('parses numbers with fallbacks', () => {
        expect(numberOption(args, 'smoothing')).toBe(0.5);
        expect(numberOption(args, 'missing', 3)).toBe(3);
        expect(intOption(args, 'limit', 100)).toBe(7);
        expect(intOption(args, 'missing')).toBeUndefined();
    });

    test('rejects non-numeric and fractional values', () => {
        expect(() => numberOption(args, 'bad')).toThrow(/non-negative number/);
        expect(() => intOption(args, 'smoothing')).toThrow(/integer/);
    });
});
