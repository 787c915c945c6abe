import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'fs-extra';
import * as path from 'path';
import { DEFAULT_CONFIG } from '../../../utils/config';
import { IOError, RecordFormatError } from '../../base/ServiceError';
import { createLibraryServices, type LibraryServices } from '../bootstrap';
import type { ContentProvider } from '../ContentProvider';
import { createTempDir, listTempFiles, manualClock, setMtime, writeFileAt } from './testUtils';

describe('LibraryIndexService', () => {
  let base: string;
  let lib: string;
  let services: LibraryServices;
  let clock: ReturnType<typeof manualClock>;

  const T0 = '2025-01-01T00:00:00.000Z';
  const older = new Date('2024-02-01T10:00:00.000Z');
  const newer = new Date('2024-02-02T10:00:00.000Z');

  const readJson = async (filePath: string): Promise<Record<string, unknown>> => fs.readJson(filePath);
  const indexPath = () => path.join(lib, 'index.json');
  const tocPath = (notebook: string) => path.join(lib, notebook, 'toc.json');

  beforeEach(async () => {
    base = await createTempDir();
    lib = path.join(base, 'Lib');
    await fs.mkdirp(lib);
    clock = manualClock(T0);
    services = createLibraryServices({ config: DEFAULT_CONFIG, clock });
  });

  afterEach(async () => {
    services.eventBus.removeAllListeners();
    await fs.remove(base);
  });

  describe('library level', () => {
    it('should create an empty index for an empty library', async () => {
      const stats = await services.indexService.reconcileLibrary(lib);

      expect(stats).toEqual({
        level: 'library',
        rootPath: lib,
        added: [],
        updated: [],
        removed: [],
        degraded: [],
        total: 0,
        changed: false,
      });
      expect(await readJson(indexPath())).toEqual({
        name: 'Lib',
        createdAt: T0,
        lastModified: T0,
        notebooks: [],
      });
    });

    it('should add newly discovered notebooks with default metadata', async () => {
      await writeFileAt(path.join(lib, 'Notes', 'a.md'), '# Hello\nWorld', older);
      await writeFileAt(path.join(lib, 'Notes', 'b.md'), 'Second', older);
      await writeFileAt(path.join(lib, 'Notes', 'image.png'), 'png', older);
      await setMtime(path.join(lib, 'Notes'), older);

      const stats = await services.indexService.reconcileLibrary(lib);

      expect(stats.added).toEqual(['Notes']);
      expect(stats.changed).toBe(true);
      const index = await readJson(indexPath());
      expect(index.notebooks).toEqual([
        {
          id: 'Notes',
          displayName: 'Notes',
          description: '',
          tags: [],
          icon: '📓',
          color: 'blue',
          noteCount: 2,
          createdAt: expect.any(String),
          lastModified: older.toISOString(),
        },
      ]);
      // Record stamped 1ms past its creation because the clock has not moved
      expect(index.lastModified).toBe('2025-01-01T00:00:00.001Z');
    });

    it('should skip the media directory and hidden directories', async () => {
      await fs.mkdirp(path.join(lib, 'media'));
      await fs.mkdirp(path.join(lib, '.archive'));
      await fs.mkdirp(path.join(lib, 'Journal'));

      await services.indexService.reconcileLibrary(lib);

      const index = await services.indexService.getLibraryIndex(lib);
      expect(index.notebooks.map((notebook) => notebook.id)).toEqual(['Journal']);
    });

    it('should preserve user edits across a rescan that only moves the mtime', async () => {
      const notebookDir = path.join(lib, 'Notes');
      await writeFileAt(path.join(notebookDir, 'a.md'), 'one', older);
      await setMtime(notebookDir, older);
      await services.indexService.reconcileLibrary(lib);
      const edited = await services.metadataService.updateNotebookFields(lib, 'Notes', {
        displayName: 'My Notes',
        tags: ['Work'],
      });

      await writeFileAt(path.join(notebookDir, 'b.md'), 'two', older);
      await setMtime(notebookDir, newer);
      await services.indexService.reconcileLibrary(lib);

      const [notebook] = (await services.indexService.getLibraryIndex(lib)).notebooks;
      expect(notebook).toEqual({
        ...edited,
        noteCount: 2,
        lastModified: newer,
      });
      expect(notebook.tags).toEqual(['Work']);
      expect(notebook.displayName).toBe('My Notes');
    });

    it('should drop notebooks whose directory is gone', async () => {
      await fs.mkdirp(path.join(lib, 'Keep'));
      await fs.mkdirp(path.join(lib, 'Drop'));
      await services.indexService.reconcileLibrary(lib);

      await fs.remove(path.join(lib, 'Drop'));
      const stats = await services.indexService.reconcileLibrary(lib);

      expect(stats.removed).toEqual(['Drop']);
      expect(stats.updated).toEqual(['Keep']);
      expect((await services.indexService.getLibraryIndex(lib)).notebooks.map((n) => n.id)).toEqual(['Keep']);
    });

    it('should leave the index byte-identical when nothing changed', async () => {
      await writeFileAt(path.join(lib, 'Notes', 'a.md'), 'text', older);
      await services.indexService.reconcileLibrary(lib);
      const first = await fs.readFile(indexPath(), 'utf8');

      clock.set('2025-06-01T00:00:00.000Z');
      const stats = await services.indexService.reconcileLibrary(lib);

      expect(stats.changed).toBe(false);
      expect(await fs.readFile(indexPath(), 'utf8')).toBe(first);
    });

    it('should fail with IOError and write nothing when the library does not exist', async () => {
      const missing = path.join(base, 'Missing');

      await expect(services.indexService.reconcileLibrary(missing)).rejects.toBeInstanceOf(IOError);
      expect(await fs.pathExists(missing)).toBe(false);
    });

    it('should refuse to overwrite a malformed index', async () => {
      await fs.writeFile(indexPath(), '{"name": 1}');

      await expect(services.indexService.reconcileLibrary(lib)).rejects.toBeInstanceOf(RecordFormatError);
      expect(await fs.readFile(indexPath(), 'utf8')).toBe('{"name": 1}');
    });
  });

  describe('notebook level', () => {
    const notes = () => path.join(lib, 'Notes');

    it('should index pages with derived title, preview and word count', async () => {
      await writeFileAt(path.join(notes(), 'a.md'), '# Hello\nWorld', older);

      const stats = await services.indexService.reconcileNotebook(notes());

      expect(stats.added).toEqual(['a.md']);
      const toc = await readJson(tocPath('Notes'));
      expect(toc).toEqual({
        name: 'Notes',
        displayName: 'Notes',
        description: '',
        tags: [],
        createdAt: T0,
        lastModified: '2025-01-01T00:00:00.001Z',
        pages: [
          {
            id: 'a.md',
            title: '# Hello',
            tags: [],
            preview: '# Hello World',
            wordCount: 3,
            createdAt: expect.any(String),
            lastModified: older.toISOString(),
            hasHeaderBlock: false,
          },
        ],
      });
    });

    it('should flag pages that open with a header block', async () => {
      await writeFileAt(path.join(notes(), 'meta.md'), '---\ntags: [x]\n---\nBody', older);

      await services.indexService.reconcileNotebook(notes());

      const [page] = (await services.indexService.getNotebookToc(notes())).pages;
      expect(page.hasHeaderBlock).toBe(true);
      expect(page.title).toBe('---');
    });

    it('should order pages newest first with ties broken by id', async () => {
      await writeFileAt(path.join(notes(), 'old.md'), 'old', older);
      await writeFileAt(path.join(notes(), 'b.md'), 'b', newer);
      await writeFileAt(path.join(notes(), 'a.md'), 'a', newer);

      await services.indexService.reconcileNotebook(notes());

      const toc = await services.indexService.getNotebookToc(notes());
      expect(toc.pages.map((page) => page.id)).toEqual(['a.md', 'b.md', 'old.md']);
    });

    it('should remove only the deleted page', async () => {
      await writeFileAt(path.join(notes(), 'a.md'), 'keep me', older);
      await writeFileAt(path.join(notes(), 'b.md'), 'delete me', newer);
      await services.indexService.reconcileNotebook(notes());
      const before = (await services.indexService.getNotebookToc(notes())).pages;

      await fs.remove(path.join(notes(), 'b.md'));
      const stats = await services.indexService.reconcileNotebook(notes());

      expect(stats.removed).toEqual(['b.md']);
      expect((await services.indexService.getNotebookToc(notes())).pages).toEqual([before[1]]);
    });

    it('should leave the TOC byte-identical when nothing changed', async () => {
      await writeFileAt(path.join(notes(), 'a.md'), 'text', older);
      await services.indexService.reconcileNotebook(notes());
      const first = await fs.readFile(tocPath('Notes'), 'utf8');

      clock.set('2025-06-01T00:00:00.000Z');
      const stats = await services.indexService.reconcileNotebook(notes());

      expect(stats.changed).toBe(false);
      expect(await fs.readFile(tocPath('Notes'), 'utf8')).toBe(first);
      expect(await listTempFiles(notes())).toEqual([]);
    });

    it('should index undecodable pages from empty text and report them', async () => {
      await writeFileAt(path.join(notes(), 'bad.md'), Buffer.from([0xff, 0xfe, 0xfd]), older);
      await writeFileAt(path.join(notes(), 'good.md'), 'fine', newer);

      const stats = await services.indexService.reconcileNotebook(notes());

      expect(stats.degraded).toEqual(['bad.md']);
      const toc = await services.indexService.getNotebookToc(notes());
      expect(toc.pages.find((page) => page.id === 'bad.md')).toMatchObject({
        title: 'bad',
        preview: '',
        wordCount: 0,
        hasHeaderBlock: false,
      });
      expect(toc.pages.find((page) => page.id === 'good.md')?.title).toBe('fine');
    });

    it('should treat content the provider cannot find as empty', async () => {
      const contentProvider: ContentProvider = {
        readPage: vi.fn().mockResolvedValue({ status: 'not-found' }),
      };
      const stubbed = createLibraryServices({ config: DEFAULT_CONFIG, clock, contentProvider });
      await writeFileAt(path.join(notes(), 'ghost.md'), 'invisible', older);

      const stats = await stubbed.indexService.reconcileNotebook(notes());

      expect(contentProvider.readPage).toHaveBeenCalledWith(notes(), 'ghost.md');
      expect(stats.degraded).toEqual(['ghost.md']);
      expect((await stubbed.indexService.getNotebookToc(notes())).pages[0].title).toBe('ghost');
    });

    it('should fail with IOError when the notebook directory is missing', async () => {
      await expect(services.indexService.reconcileNotebook(path.join(lib, 'Nope'))).rejects.toBeInstanceOf(IOError);
    });
  });

  describe('reconcile', () => {
    it('should dispatch on level', async () => {
      await fs.mkdirp(path.join(lib, 'Notes'));

      const library = await services.indexService.reconcile(lib, 'library');
      const notebook = await services.indexService.reconcile(path.join(lib, 'Notes'), 'notebook');

      expect(library.level).toBe('library');
      expect(notebook.level).toBe('notebook');
    });
  });

  describe('end-to-end', () => {
    it('should track a library from empty through edits', async () => {
      await services.indexService.reconcileLibrary(lib);
      expect((await readJson(indexPath())).notebooks).toEqual([]);

      await writeFileAt(path.join(lib, 'Notes', 'a.md'), '# Hello\nWorld', older);
      await services.indexService.reconcileLibrary(lib);
      const [notebook] = (await services.indexService.getLibraryIndex(lib)).notebooks;
      expect(notebook).toMatchObject({ id: 'Notes', noteCount: 1 });

      const notesPath = path.join(lib, 'Notes');
      await services.indexService.reconcileNotebook(notesPath);
      let [page] = (await services.indexService.getNotebookToc(notesPath)).pages;
      expect(page).toMatchObject({ id: 'a.md', title: '# Hello', wordCount: 3, hasHeaderBlock: false });

      await services.metadataService.updatePageTags(notesPath, 'a.md', ['draft']);
      await writeFileAt(path.join(notesPath, 'a.md'), '# Hello\nWorld\nA third line', newer);
      await services.indexService.reconcileNotebook(notesPath);

      [page] = (await services.indexService.getNotebookToc(notesPath)).pages;
      expect(page).toMatchObject({
        id: 'a.md',
        title: '# Hello',
        preview: '# Hello World A third line',
        wordCount: 6,
        tags: ['draft'],
        lastModified: newer,
      });
    });
  });

  describe('reconcileLibraryTree', () => {
    it('should reconcile every notebook and report the ones that fail', async () => {
      await writeFileAt(path.join(lib, 'Good', 'a.md'), 'fine', older);
      await writeFileAt(path.join(lib, 'Broken', 'b.md'), 'fine', older);
      await fs.writeFile(tocPath('Broken'), 'not json');

      const result = await services.indexService.reconcileLibraryTree(lib);

      expect(result.library.added).toEqual(['Broken', 'Good']);
      expect(result.notebooks.map((stats) => stats.rootPath)).toEqual([path.join(lib, 'Good')]);
      expect(result.failures).toEqual([
        { notebookId: 'Broken', error: `Malformed record file at ${tocPath('Broken')}` },
      ]);
      expect((await readJson(tocPath('Good'))).pages).toHaveLength(1);
    });

    it('should leave every record byte-identical on a second sweep', async () => {
      await writeFileAt(path.join(lib, 'Notes', 'a.md'), 'text', older);
      await fs.mkdirp(path.join(lib, 'Empty'));
      await services.indexService.reconcileLibraryTree(lib);
      const index = await fs.readFile(indexPath(), 'utf8');
      const notesToc = await fs.readFile(tocPath('Notes'), 'utf8');
      const emptyToc = await fs.readFile(tocPath('Empty'), 'utf8');
      const listener = vi.fn();
      services.eventBus.on('library:reconciled', listener);

      clock.set('2025-06-01T00:00:00.000Z');
      const result = await services.indexService.reconcileLibraryTree(lib);

      expect(result.library.changed).toBe(false);
      expect(result.notebooks.map((stats) => stats.changed)).toEqual([false, false]);
      expect(listener).not.toHaveBeenCalled();
      expect(await fs.readFile(indexPath(), 'utf8')).toBe(index);
      expect(await fs.readFile(tocPath('Notes'), 'utf8')).toBe(notesToc);
      expect(await fs.readFile(tocPath('Empty'), 'utf8')).toBe(emptyToc);
    });

    it('should record notebook mtimes as they stand after the TOCs are written', async () => {
      await writeFileAt(path.join(lib, 'Notes', 'a.md'), 'text', older);

      await services.indexService.reconcileLibraryTree(lib);

      const [notebook] = (await services.indexService.getLibraryIndex(lib)).notebooks;
      const stats = await fs.stat(path.join(lib, 'Notes'));
      expect(notebook.lastModified).toEqual(stats.mtime);
    });
  });

  describe('events', () => {
    it('should emit after a persisted reconciliation only', async () => {
      const listener = vi.fn();
      services.eventBus.on('library:reconciled', listener);
      await fs.mkdirp(path.join(lib, 'Notes'));

      await services.indexService.reconcileLibrary(lib);
      await services.indexService.reconcileLibrary(lib);

      expect(listener).toHaveBeenCalledTimes(1);
      expect(listener).toHaveBeenCalledWith(
        expect.objectContaining({
          libraryPath: lib,
          stats: expect.objectContaining({ added: ['Notes'], changed: true }),
        })
      );
    });
  });
});
