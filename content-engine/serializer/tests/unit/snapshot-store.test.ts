import { mkdtemp, readdir, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { basename, join } from 'path';
import { createHash } from 'crypto';
import { saveSnapshot, loadSnapshot, saveDocument } from '../../src/snapshot-store.js';
import { serializeSnapshot } from '../../src/snapshot.js';
import { LessonSnapshot } from '../../src/types.js';

const SNAPSHOT: LessonSnapshot = {
  version: '1.0.0',
  stage: 'lesson-plan',
  subject: 'Chemistry',
  difficulty: 'Advanced',
  generatedAt: '2026-01-05T10:00:00.000Z',
  topics: [
    {
      id: 'T1',
      title: 'Bonding',
      description: 'Bonding',
      content: 'Covalent and ionic bonds.',
      subtopics: [{ id: 'T1.1', title: 'Orbitals', description: 'Orbitals', subtopics: [] }]
    }
  ]
};

describe('Snapshot store', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'notes-store-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  test('should save into a new directory and load the same snapshot back', async () => {
    const filePath = join(dir, 'nested', 'lesson-plan.json');

    const saved = await saveSnapshot(SNAPSHOT, filePath);

    expect(saved.success).toBe(true);
    if (!saved.success) return;
    const json = serializeSnapshot(SNAPSHOT);
    expect(saved.value.filePath).toBe(filePath);
    expect(saved.value.size).toBe(Buffer.byteLength(json, 'utf8'));
    expect(saved.value.checksum).toBe(createHash('sha256').update(json).digest('hex'));
    expect(await readdir(join(dir, 'nested'))).toEqual(['lesson-plan.json']);

    const loaded = await loadSnapshot(filePath);
    expect(loaded.success).toBe(true);
    if (!loaded.success) return;
    expect(loaded.value).toEqual(SNAPSHOT);
  });

  test('should replace an existing file', async () => {
    const filePath = join(dir, 'snapshot.json');
    await writeFile(filePath, 'old contents');

    const saved = await saveSnapshot(SNAPSHOT, filePath);

    expect(saved.success).toBe(true);
    expect(await readFile(filePath, 'utf8')).toBe(serializeSnapshot(SNAPSHOT));
  });

  test('should report a missing file', async () => {
    const result = await loadSnapshot(join(dir, 'absent.json'));

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.errors.code).toBe('E-SERIALIZE-READ-FAILED');
  });

  test('should reject a corrupt file', async () => {
    const filePath = join(dir, 'corrupt.json');
    await writeFile(filePath, '{ not json');

    const result = await loadSnapshot(filePath);

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.errors.code).toBe('E-SERIALIZE-INVALID-JSON');
  });

  test('should write binary documents', async () => {
    const filePath = join(dir, 'notes.docx');
    const bytes = Buffer.from([0x50, 0x4b, 0x03, 0x04]);

    const saved = await saveDocument(bytes, filePath);

    expect(saved.success).toBe(true);
    if (!saved.success) return;
    expect(saved.value.size).toBe(4);
    expect(await readFile(filePath)).toEqual(bytes);
  });

  test('should fail when the target is a directory', async () => {
    const result = await saveDocument('text', dir);

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.errors.code).toBe('E-SERIALIZE-WRITE-FAILED');
    const leftovers = (await readdir(tmpdir())).filter(name => name.startsWith(`${basename(dir)}.`));
    expect(leftovers).toEqual([]);
  });
});
