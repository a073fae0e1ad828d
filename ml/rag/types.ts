export type GradeValue = "1" | "2" | "3" | "4" | "5";

export const GRADE_VALUES: readonly GradeValue[] = ["1", "2", "3", "4", "5"];

export type GradeRecord = {
  grade: GradeValue;
  description: string;
};

export type TermRecord = {
  meddra_code: string;
  meddra_soc: string;
  ctcae_term: string;
  definition: string;
  navigational_note?: string;
  grades: GradeRecord[];
};

export type DocType = "term" | "grade_description";

export type TermDocumentMetadata = {
  doc_type: "term";
  meddra_code: string;
  meddra_soc: string;
  ctcae_term: string;
  definition: string;
};

export type GradeDocumentMetadata = {
  doc_type: "grade_description";
  meddra_code: string;
  meddra_soc: string;
  ctcae_term: string;
  grade: GradeValue;
  description: string;
};

export type DocumentMetadata = TermDocumentMetadata | GradeDocumentMetadata;

export type RetrievableDocument = {
  id: string;
  content: string;
  metadata: DocumentMetadata;
};

export type EmbeddedDocument = RetrievableDocument & {
  embedding: number[];
};

/** Score is cosine similarity: higher is better on every backend. */
export type SearchHit = {
  document: RetrievableDocument;
  score: number;
};

export type MetadataFilter = {
  doc_type?: DocType;
  ctcae_term?: string;
  meddra_soc?: string;
};
