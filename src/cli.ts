#!/usr/bin/env node
import 'dotenv/config';
import fs from 'fs/promises';
import path from 'path';
import chalk from 'chalk';
import boxen from 'boxen';
import ora from 'ora';
import { loadConfig } from './config.js';
import { VERSION } from './version.js';
import {
    ParsedArgs,
    intOption,
    listOption,
    numberOption,
    parseCliArgs,
    stringOption,
} from './cliArgs.js';
import { DEFAULTS, NgramRange, TokenizeOptions, TrawlException, createInvalidArgumentError } from './types/index.js';
import { CorpusFormat, isCorpusFormat, readAllDocuments } from './corpus/loader.js';
import { FrequencyTable } from './counting/frequencyTable.js';
import { collapseSubsumed } from './counting/subsumption.js';
import { ReferenceIndex } from './reference/referenceIndex.js';
import { FileSnapshotStorage } from './reference/storage.js';
import { trawl } from './trawl/pipeline.js';
import { CorpusGenerator } from './generation/generator.js';
import { JsonCorpusStore } from './generation/store.js';
import { StandardLLMProvider } from './llm/provider.js';

const HELP = `
proverb-trawl CLI v${VERSION}

Usage:
  trawl generate [--out proverbs.json]        Generate a corpus of model-written proverbs
  trawl ngrams <file...>                      Count recurring n-grams in corpus files
  trawl index <file...> --out <snapshot>      Index a reference corpus for later runs
  trawl run <generated...> --reference <file> Rank emergent proverbs by novelty

Generation options:
  --total <n>           Target corpus size (default: TRAWL_TOTAL or ${DEFAULTS.total})
  --concurrency <n>     Requests in flight (default: TRAWL_CONCURRENCY or ${DEFAULTS.concurrency})
  --save-interval <n>   Save after this many new proverbs (default: ${DEFAULTS.saveInterval})
  --model <id>          Model id (default: TRAWL_MODEL)

Counting options:
  --min-n <n>           Shortest phrase in tokens (default: ${DEFAULTS.minN})
  --max-n <n>           Longest phrase in tokens (default: ${DEFAULTS.maxN})
  --min-count <n>       Minimum occurrences (default: ${DEFAULTS.minCount})
  --min-docs <n>        Minimum documents containing the phrase (default: ${DEFAULTS.minDocuments})
  --cross-sentences     Let phrases span sentence boundaries
  --format <f>          Corpus format: json, jsonl, lines, paragraphs (default: by extension)

Run options:
  --reference, -r <f...> Reference corpus files (after the generated files)
  --reference-index <f> Reference snapshot written by \`trawl index\`
  --max-ref-count <n>   Drop phrases seen more often than this in the reference
  --min-novelty <x>     Drop phrases scoring below this
  --smoothing <k>       Add-k smoothing of reference counts (default: ${DEFAULTS.smoothing})
  --limit <n>           Maximum candidates (default: ${DEFAULTS.limit})
  --no-collapse         Keep fragments of longer phrases
  --out, -o <file>      Write the JSON report here
  --json                Print JSON instead of a table

  --help, -h            Show this help
  --version, -v         Show version

Environment (.env is read):
  OPENAI_API_KEY, OPENAI_BASE_URL, TRAWL_MODEL, TRAWL_CONCURRENCY,
  TRAWL_TOTAL, TRAWL_SAVE_INTERVAL, TRAWL_OUTPUT
`;

function rangeFrom(args: ParsedArgs): NgramRange {
    return {
        minN: intOption(args, 'min-n', DEFAULTS.minN),
        maxN: intOption(args, 'max-n', DEFAULTS.maxN),
    };
}

function tokenizeFrom(args: ParsedArgs): TokenizeOptions {
    return { crossSentences: args.switches.has('cross-sentences') };
}

function formatFrom(args: ParsedArgs): CorpusFormat | undefined {
    const format = stringOption(args, 'format');
    if (format === undefined) return undefined;
    if (!isCorpusFormat(format)) {
        throw createInvalidArgumentError('--format', format, 'json, jsonl, lines or paragraphs');
    }
    return format;
}

function requireFiles(args: ParsedArgs, what: string): string[] {
    if (args.positionals.length === 0) {
        throw createInvalidArgumentError(what, '(none)', 'at least one file');
    }
    return args.positionals;
}

async function writeJson(file: string, value: unknown): Promise<void> {
    await fs.mkdir(path.dirname(path.resolve(file)), { recursive: true });
    await fs.writeFile(file, JSON.stringify(value, null, 2));
}

async function runGenerate(args: ParsedArgs): Promise<void> {
    const config = loadConfig();
    const out = stringOption(args, 'out') ?? config.output;
    const provider = new StandardLLMProvider({
        ...config,
        model: stringOption(args, 'model') ?? config.model,
    });

    console.log(chalk.dim(`Model: ${provider.modelId}${provider.baseURL ? ` @ ${provider.baseURL}` : ''}`));
    const spinner = ora('Loading corpus...').start();
    const generator = new CorpusGenerator(provider, new JsonCorpusStore(out), {
        total: intOption(args, 'total', config.total),
        concurrency: intOption(args, 'concurrency', config.concurrency),
        saveInterval: intOption(args, 'save-interval', config.saveInterval),
        onProgress: (completed, remaining) => {
            spinner.text = `Generating proverbs ${completed}/${remaining}`;
        },
    });

    try {
        const result = await generator.run();
        if (result.alreadyComplete) {
            spinner.info(chalk.yellow(`Corpus already complete: ${result.total} proverbs in ${out}`));
            return;
        }
        spinner.succeed(`Generated ${result.succeeded} proverbs`);
        console.log(boxen([
            `Requested: ${result.requested}`,
            `Succeeded: ${chalk.green(result.succeeded)}`,
            `Failed:    ${result.failed > 0 ? chalk.red(result.failed) : 0}`,
            `Saved:     ${result.unique} unique in ${out}`,
            ...(result.lastError ? [chalk.dim(`Last error: ${result.lastError}`)] : []),
        ].join('\n'), { title: 'Generation', padding: 1, borderColor: 'cyan' }));
    } catch (e) {
        spinner.fail('Generation stopped');
        throw e;
    }
}

async function runNgrams(args: ParsedArgs): Promise<void> {
    const files = requireFiles(args, 'corpus');
    const table = new FrequencyTable(rangeFrom(args), tokenizeFrom(args));
    const spinner = ora(`Counting n-grams in ${files.length} file(s)...`).start();
    for await (const text of readAllDocuments(files, formatFrom(args))) {
        table.addDocument(text);
    }
    spinner.stop();

    const distinct = table.size;
    table.prune({
        minCount: intOption(args, 'min-count', DEFAULTS.minCount),
        minDocuments: intOption(args, 'min-docs', 1),
    });
    const entries = args.switches.has('collapse') ? collapseSubsumed(table.entries()).kept : table.entries();
    const keep = new Set(entries.map(e => e.ngram));
    const top = table.top(intOption(args, 'top', 50), e => keep.has(e.ngram));

    if (args.switches.has('json')) {
        console.log(JSON.stringify(top, null, 2));
        return;
    }
    console.log(chalk.dim(`${table.documentCount} documents, ${table.tokenCount} tokens, ${distinct} distinct n-grams`));
    for (const e of top) {
        console.log(`${chalk.bold(String(e.count).padStart(6))} ${chalk.dim(String(e.documents).padStart(5))}  ${e.ngram}`);
    }
}

async function runIndex(args: ParsedArgs): Promise<void> {
    const files = requireFiles(args, 'reference corpus');
    const out = stringOption(args, 'out');
    if (!out) {
        throw createInvalidArgumentError('--out', '(missing)', 'a snapshot file path');
    }
    const index = new ReferenceIndex({ range: rangeFrom(args), tokenize: tokenizeFrom(args) });
    const spinner = ora('Indexing reference corpus...').start();
    await index.addDocuments(readAllDocuments(files, formatFrom(args)));

    const storage = new FileSnapshotStorage(path.dirname(out));
    const written = await storage.save(path.basename(out), index.toSnapshot());
    spinner.succeed(`Indexed ${index.documentCount} documents (${index.size} n-grams) into ${written}`);
}

async function loadReferenceIndex(file: string): Promise<ReferenceIndex> {
    const storage = new FileSnapshotStorage(path.dirname(file));
    const data = await storage.load(path.basename(file));
    if (data === null) {
        throw createInvalidArgumentError('--reference-index', file, 'an existing snapshot file');
    }
    return ReferenceIndex.fromSnapshot(data);
}

async function runTrawl(args: ParsedArgs): Promise<void> {
    const files = requireFiles(args, 'generated corpus');
    const format = formatFrom(args);
    const referenceFiles = listOption(args, 'reference');
    const snapshot = stringOption(args, 'reference-index');

    let reference: ReferenceIndex | AsyncIterable<string>;
    if (snapshot) {
        reference = await loadReferenceIndex(snapshot);
    } else if (referenceFiles.length > 0) {
        reference = readAllDocuments(referenceFiles, format);
    } else {
        throw createInvalidArgumentError('--reference', '(missing)', 'a reference corpus file or --reference-index');
    }

    const spinner = ora('Trawling...').start();
    const report = await trawl(readAllDocuments(files, format), reference, {
        range: rangeFrom(args),
        tokenize: tokenizeFrom(args),
        minCount: intOption(args, 'min-count', DEFAULTS.minCount),
        minDocuments: intOption(args, 'min-docs', DEFAULTS.minDocuments),
        maxReferenceCount: intOption(args, 'max-ref-count'),
        minNovelty: numberOption(args, 'min-novelty', 0),
        smoothing: numberOption(args, 'smoothing', DEFAULTS.smoothing),
        limit: intOption(args, 'limit', DEFAULTS.limit),
        collapse: !args.switches.has('no-collapse'),
        onProgress: (_stage, message) => {
            spinner.text = message;
        },
    });
    spinner.succeed(`Trawled ${report.stats.generatedDocuments} documents in ${report.stats.elapsedMs}ms`);

    const out = stringOption(args, 'out');
    if (out) {
        await writeJson(out, report);
        console.log(chalk.dim(`Report written to ${out}`));
    }

    if (args.switches.has('json')) {
        console.log(JSON.stringify(report, null, 2));
        return;
    }

    if (report.candidates.length === 0) {
        console.log(chalk.yellow('No emergent proverbs found.'));
        return;
    }
    report.candidates.forEach((c, i) => {
        const marker = c.absentFromReference ? chalk.green('new') : chalk.dim(`ref ${c.referenceCount}`);
        console.log(`${chalk.bold(String(i + 1).padStart(3))}. ${c.ngram}`);
        console.log(chalk.dim(`     ×${c.count} in ${c.documents} docs · novelty ${c.novelty.toFixed(1)} · `) + marker);
    });
    const { stats } = report;
    console.log(boxen([
        `Generated: ${stats.generatedDocuments} docs, ${stats.generatedTokens} tokens`,
        `Reference: ${stats.referenceDocuments} docs, ${stats.referenceTokens} tokens`,
        `N-grams:   ${stats.distinctNgrams} distinct → ${stats.afterPrune} recurring → ${stats.afterPrune - stats.subsumed} maximal`,
        `Returned:  ${stats.returned} of ${stats.scored}`,
    ].join('\n'), { title: 'Trawl', padding: 1, borderColor: 'magenta' }));
}

async function main(): Promise<void> {
    const args = parseCliArgs(process.argv.slice(2));

    if (args.switches.has('version')) {
        console.log(VERSION);
        return;
    }
    if (args.switches.has('help') || !args.command) {
        console.log(HELP);
        return;
    }

    switch (args.command) {
        case 'generate':
            return runGenerate(args);
        case 'ngrams':
            return runNgrams(args);
        case 'index':
            return runIndex(args);
        case 'run':
            return runTrawl(args);
        default:
            console.error(chalk.red(`Unknown command: ${args.command}`));
            console.log(HELP);
            process.exitCode = 1;
    }
}

main().catch((e: unknown) => {
    if (e instanceof TrawlException) {
        console.error(chalk.red(`Error: ${e.message}`));
        if (e.error.suggestion) console.error(chalk.dim(e.error.suggestion));
    } else {
        console.error(chalk.red('Error:'), e instanceof Error ? e.message : String(e));
    }
    process.exit(1);
});
