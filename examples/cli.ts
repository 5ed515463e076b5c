import * as fs from 'fs';
import * as path from 'path';
import { Validator } from '../src/engine/Validator';
import { describeClue } from '../src/engine/Clue';
import { SAMPLE_PUZZLE } from '../src/defaults';
import { toPuzzleRecord } from '../src/records';

// Usage: cli.ts [--trace] [puzzle.json ...]
// With no files, validates the bundled sample puzzle.

const args = process.argv.slice(2);
const verbose = args.includes('--trace');
const files = args.filter(a => a !== '--trace');

const validator = new Validator({
    timeoutMs: 5000,
    onTrace: verbose ? (message) => console.log(`  [trace] ${message}`) : undefined,
});

const inputs: { name: string; record: unknown }[] = files.length > 0
    ? files.map(file => ({ name: path.basename(file), record: JSON.parse(fs.readFileSync(file, 'utf-8')) }))
    : [{ name: 'sample', record: toPuzzleRecord(SAMPLE_PUZZLE) }];

if (files.length === 0) {
    console.log(`## ${SAMPLE_PUZZLE.title}`);
    SAMPLE_PUZZLE.clues.forEach((clue, i) => console.log(`${i + 1}. ${describeClue(clue)}`));
    console.log('');
}

let failures = 0;
for (const { name, record } of inputs) {
    const result = validator.validateRecord(record);
    const mark = result.status === 'valid' ? '✅' : '❌';
    console.log(`${mark} ${name}: ${result.status}`);
    console.log(`   ${result.explanation}`);
    if (result.status !== 'valid') failures++;
}

if (failures > 0) {
    console.error(`\n${failures} of ${inputs.length} puzzle(s) failed validation.`);
    process.exitCode = 1;
}
