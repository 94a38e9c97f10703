import fs from 'node:fs';
import path from 'node:path';
import { MemoryStore, tokenize, type LessonMetadata } from '../../../src/memory/store';
import { makeTempDir, removeDir } from '../../helpers/tmp';

const meta: LessonMetadata = { type: 'lesson', tags: ['kiln', 'task'], confidence: 0.5, created: '2024-05-01' };

describe('MemoryStore', () => {
  let dir: string;
  let store: MemoryStore;

  beforeEach(() => {
    dir = makeTempDir();
    store = new MemoryStore(path.join(dir, 'memories'));
  });

  afterEach(() => {
    removeDir(dir);
  });

  it('creates its folders and an empty index on first use', async () => {
    await expect(store.retrieve('anything')).resolves.toEqual([]);
    const root = path.join(dir, 'memories');
    expect(fs.readdirSync(root).sort()).toEqual(['facts', 'index.json', 'lessons', 'projects', 'snippets']);
    expect(fs.readFileSync(path.join(root, 'index.json'), 'utf8')).toBe('{}');
  });

  it('writes the lesson with a metadata header', async () => {
    const notePath = await store.writeLesson('calc', '  Task calc completed.\n\n', meta);

    expect(notePath).toBe(path.join(dir, 'memories', 'lessons', 'calc.md'));
    expect(fs.readFileSync(notePath, 'utf8')).toBe('---\ntype: "lesson"\ntags: ["kiln","task"]\nconfidence: 0.5\ncreated: "2024-05-01"\n---\n\nTask calc completed.\n');
  });

  it('indexes every token of the note with a relative path', async () => {
    await store.writeLesson('calc', 'Parser fix', meta);
    const index = await store.loadIndex();
    expect(index.parser).toEqual(['lessons/calc.md']);
    expect(index.kiln).toEqual(['lessons/calc.md']);
  });

  it('retrieves a lesson by one of its tokens', async () => {
    await store.writeLesson('calc', 'Fixed the fibonacci helper', meta);
    const notes = await store.retrieve('Fibonacci');
    expect(notes).toHaveLength(1);
    expect(notes[0]).toContain('Fixed the fibonacci helper');
  });

  it('ranks by overlap and keeps first-seen order on ties', async () => {
    await store.writeLesson('a', 'alpha', meta);
    await store.writeLesson('b', 'alpha beta', meta);
    await store.writeLesson('c', 'gamma', meta);

    const ranked = await store.retrieve('beta alpha gamma');
    expect(ranked.map((n) => n.trim().split('\n').pop())).toEqual(['alpha beta', 'alpha', 'gamma']);
  });

  it('counts repeated query tokens', async () => {
    await store.writeLesson('a', 'alpha', meta);
    await store.writeLesson('b', 'beta', meta);
    const ranked = await store.retrieve('alpha beta beta', 1);
    expect(ranked[0]).toContain('\n\nbeta\n');
  });

  it('skips stale index entries and still fills the limit', async () => {
    await store.writeLesson('a', 'shared one', meta);
    await store.writeLesson('b', 'shared two', meta);
    fs.rmSync(path.join(dir, 'memories', 'lessons', 'a.md'));

    const notes = await store.retrieve('shared', 1);
    expect(notes).toHaveLength(1);
    expect(notes[0]).toContain('shared two');
  });

  it('is idempotent on an unchanged index', async () => {
    await store.writeLesson('a', 'widget parser', meta);
    const first = await store.retrieve('widget');
    const second = await store.retrieve('widget');
    expect(second).toEqual(first);
  });

  it('does not duplicate paths when a lesson is rewritten', async () => {
    await store.writeLesson('a', 'widget', meta);
    await store.writeLesson('a', 'widget again', meta);
    const index = await store.loadIndex();
    expect(index.widget).toEqual(['lessons/a.md']);
  });
});

describe('tokenize', () => {
  it('keeps lowercase alphanumeric runs', () => {
    expect(tokenize('Fix test_foo.py: 2 errors!')).toEqual(['fix', 'test', 'foo', 'py', '2', 'errors']);
  });

  it('returns nothing for punctuation only', () => {
    expect(tokenize('--- !!')).toEqual([]);
  });
});
