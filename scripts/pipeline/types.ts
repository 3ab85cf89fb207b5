/**
 * Core types for the vote-ranking report pipeline.
 */

// ---------- Extraction ----------

export interface ExtractedContent {
  headline: string;
  body: string;
}

/** Tag names tried in priority order, most specific first. */
export interface TagVocabulary {
  headline: readonly string[];
  body: readonly string[];
  /** Inner tag that marks the end of the CSV payload. */
  bodyTerminator: string;
}

export type GlyphTable = ReadonlyMap<string, string>;

// ---------- Rows ----------

export type Row = string[];

export interface HeaderRow {
  names: string[];
  /** Column name -> first index carrying that name. */
  index: ReadonlyMap<string, number>;
}

export interface ClassifiedRows {
  header: HeaderRow;
  candidates: Row[];
}

// ---------- Record sets ----------

export type ColumnKind = "text" | "count";

export interface ColumnSpec {
  name: string;
  kind: ColumnKind;
}

export type CellValue = string | number;

export interface RecordSet {
  columns: ColumnSpec[];
  rows: CellValue[][];
}

// ---------- Reports ----------

export type ReportKind = "full" | "winners" | "losers";

export interface ReportSet {
  kind: ReportKind;
  /** Appended to the sanitized headline to form the file name. */
  suffix: string;
  sheetName: string;
  /**
   * When set, the renderer folds party name and status into the
   * candidate-name column and hides their own columns.
   */
  combineIdentity: boolean;
  records: RecordSet;
}

// ---------- Results ----------

export type PipelineErrorKind =
  | "ReadFailure"
  | "EncodingUnresolved"
  | "TagNotFound"
  | "HeaderNotFound"
  | "NoCandidateData"
  | "RenderFailure";

export interface PipelineError {
  kind: PipelineErrorKind;
  message: string;
}

export type StageResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: PipelineError };

export interface AnalyzedDocument {
  encoding: string;
  headline: string;
  records: RecordSet;
  reports: ReportSet[];
}

export type DocumentResult =
  | ({ ok: true } & AnalyzedDocument)
  | { ok: false; error: PipelineError };

// ---------- Options ----------

export interface PipelineOptions {
  encodings: readonly string[];
  loserColumns: readonly string[];
  vocabulary: TagVocabulary;
  glyphs: GlyphTable;
}
