/** Level of the directory tree a record describes. */
export type IndexLevel = 'library' | 'notebook';

/** Notebook entry in a library's index. Doubles as the notebook directory's metadata. */
export interface NotebookEntry {
  id: string; // Directory name
  // User-editable
  displayName: string;
  description: string;
  tags: string[];
  icon: string;
  color: string;
  // Derived from the filesystem
  noteCount: number;
  createdAt: Date;
  lastModified: Date;
}

/** Library record, persisted as the index file at a library root. */
export interface LibraryIndex {
  name: string;
  createdAt: Date;
  lastModified: Date;
  notebooks: NotebookEntry[];
}

/** Page entry in a notebook's table of contents. */
export interface PageEntry {
  id: string; // File name, extension included
  title: string;
  tags: string[]; // User-editable
  preview: string;
  wordCount: number;
  createdAt: Date;
  lastModified: Date;
  hasHeaderBlock: boolean;
}

/** Notebook table of contents, persisted as the toc file at a notebook root. */
export interface NotebookToc {
  name: string;
  displayName: string;
  description: string;
  tags: string[];
  createdAt: Date;
  lastModified: Date;
  pages: PageEntry[];
}

export type ScanKind = 'notebooks' | 'pages';

/** One child of a scanned directory. */
export interface ScannedEntry {
  name: string;
  isDirectory: boolean;
  extension: string; // Lower-cased, leading dot; empty for directories
  createdAt: Date;
  modifiedAt: Date;
}

/** What a library-level scan knows about a notebook directory. */
export interface NotebookObservation {
  id: string;
  noteCount: number;
  createdAt: Date;
  modifiedAt: Date;
}

/** What a notebook-level scan knows about a page file, content already extracted. */
export interface PageObservation {
  id: string;
  title: string;
  preview: string;
  wordCount: number;
  hasHeaderBlock: boolean;
  createdAt: Date;
  modifiedAt: Date;
}

export interface PageContentInfo {
  title: string;
  preview: string;
  wordCount: number;
}

export type NotebookFieldsPatch = Partial<
  Pick<NotebookEntry, 'displayName' | 'description' | 'tags' | 'icon' | 'color'>
>;

export type NotebookTocFieldsPatch = Partial<Pick<NotebookToc, 'displayName' | 'description' | 'tags'>>;

/** Result of a single reconciliation. */
export interface ReconcileStats {
  level: IndexLevel;
  rootPath: string;
  added: string[];
  updated: string[];
  removed: string[];
  degraded: string[]; // Pages whose content could not be read
  total: number;
  changed: boolean; // False when the record on disk was left untouched
}

export interface LibraryTreeResult {
  library: ReconcileStats;
  notebooks: ReconcileStats[];
  failures: Array<{ notebookId: string; error: string }>;
}

/** Outcome of reading a page's raw text. */
export type PageContentResult =
  | { status: 'ok'; text: string }
  | { status: 'not-found' }
  | { status: 'unreadable'; reason: string };
