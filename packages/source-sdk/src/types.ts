export const CONTENT_SOURCES = ['linkedin', 'indeed', 'email-generic', 'scrape'] as const;

export type ContentSource = (typeof CONTENT_SOURCES)[number];

/**
 * One unit of raw input handed over by a browser driver, mail client or paste buffer.
 * `body` is HTML or plain text.
 */
export interface RawContent {
  source: ContentSource;
  body: string;
  url?: string;
  receivedAt?: Date;
}

/**
 * A posting as extracted from raw content. Built once per extraction pass and never mutated.
 */
export interface ParsedJob {
  readonly title: string;
  readonly employer?: string;
  readonly url?: string;
  readonly location?: string;
  readonly payMin?: number;
  readonly payMax?: number;
  readonly jobCode?: string;
  readonly noLongerAccepting: boolean;
  readonly source: ContentSource;
  readonly rawText: string;
}

/**
 * Read-only projection of a stored record, used for duplicate checks.
 */
export interface ExistingRecordView {
  id: string;
  title: string;
  employer?: string;
  url?: string;
}

export interface RecordLookup {
  findByUrl(url: string): Promise<ExistingRecordView | undefined>;
  /** Records whose employer case-insensitively equals `employer`, oldest first. */
  listByEmployer(employer: string): Promise<ExistingRecordView[]>;
  /** Every record, in ascending insertion order. */
  listAll(): Promise<ExistingRecordView[]>;
}

export interface RecordStore extends RecordLookup {
  insert(job: ParsedJob): Promise<string>;
  remove(id: string): Promise<void>;
}

export interface ProviderManifest {
  id: string;
  name: string;
  source: ContentSource;
}

export interface ContentProvider {
  manifest: ProviderManifest;
  fetch(): Promise<RawContent[]>;
}
