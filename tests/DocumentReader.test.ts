import { describe, it, before, after } from 'node:test';
import * as assert from 'assert';
import * as fs from 'fs';
import * as path from 'path';
import { DocumentReader } from '../src/DocumentReader';
import { ReadError, StructuralError } from '../src/errors';
import { makeTempDir, removeDir } from './helpers';

describe('DocumentReader', () => {
    let tempDir: string;

    before(() => {
        tempDir = makeTempDir('reader');
        fs.mkdirSync(path.join(tempDir, 'nested', 'deeper'), { recursive: true });
        fs.mkdirSync(path.join(tempDir, 'node_modules', 'pkg'), { recursive: true });
        fs.writeFileSync(path.join(tempDir, 'b.feature'), 'Feature: B\n');
        fs.writeFileSync(path.join(tempDir, 'a.feature'), '\uFEFFFeature: A\n');
        fs.writeFileSync(path.join(tempDir, 'notes.txt'), 'not a scenario');
        fs.writeFileSync(path.join(tempDir, 'nested', 'deeper', 'c.feature'), 'Feature: C\n');
        fs.writeFileSync(path.join(tempDir, 'nested', 'd.story'), 'Feature: D\n');
        fs.writeFileSync(path.join(tempDir, 'node_modules', 'pkg', 'e.feature'), 'Feature: E\n');
        fs.writeFileSync(path.join(tempDir, 'latin1.txt'), Buffer.from([0x47, 0x69, 0x76, 0x65, 0x6e, 0x20, 0x63, 0x61, 0x66, 0xe9]));
    });

    after(() => removeDir(tempDir));

    it('reads UTF-8 text and strips the byte-order mark', () => {
        const document = new DocumentReader().read(path.join(tempDir, 'a.feature'));
        assert.strictEqual(document.path, path.join(tempDir, 'a.feature'));
        assert.strictEqual(document.rawText, 'Feature: A\n');
        assert.ok(Object.isFrozen(document));
    });

    it('fails with a ReadError for a missing document', () => {
        const missing = path.join(tempDir, 'missing.feature');
        assert.throws(
            () => new DocumentReader().read(missing),
            (err: unknown) => err instanceof ReadError && err.documentPath === missing
        );
    });

    it('fails with a ReadError for a directory', () => {
        assert.throws(() => new DocumentReader().read(path.join(tempDir, 'nested')), ReadError);
    });

    it('fails with a ReadError for a document over the size limit', () => {
        assert.throws(
            () => new DocumentReader(4).read(path.join(tempDir, 'b.feature')),
            (err: unknown) => err instanceof ReadError && err.message.includes('too large')
        );
    });

    it('fails with a ReadError for bytes that are not valid UTF-8', () => {
        const latin1 = path.join(tempDir, 'latin1.txt');
        assert.throws(
            () => new DocumentReader().read(latin1),
            (err: unknown) => err instanceof ReadError && err.message === `Scenario document is not valid UTF-8: ${latin1}`
        );
    });

    it('finds documents recursively, sorted, skipping node_modules', () => {
        const files = new DocumentReader().findDocuments(tempDir, ['.feature']);
        assert.deepStrictEqual(files, [
            path.join(tempDir, 'a.feature'),
            path.join(tempDir, 'b.feature'),
            path.join(tempDir, 'nested', 'deeper', 'c.feature'),
        ]);
    });

    it('accepts several extensions', () => {
        const files = new DocumentReader().findDocuments(tempDir, ['.feature', '.story']);
        // sorted by full path: nested/d.story precedes nested/deeper/
        assert.deepStrictEqual(files.map(f => path.basename(f)), ['a.feature', 'b.feature', 'd.story', 'c.feature']);
    });

    it('treats a missing input directory as structural', () => {
        assert.throws(() => new DocumentReader().findDocuments(path.join(tempDir, 'nope'), ['.feature']), StructuralError);
    });
});
