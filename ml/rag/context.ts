import type { SearchHit } from "./types";

function formatHit(hit: SearchHit): string {
  const { metadata } = hit.document;
  const similarity = `Similarity: ${hit.score.toFixed(4)}`;
  if (metadata.doc_type === "term") {
    return [
      `CTCAE Term: ${metadata.ctcae_term}`,
      `MedDRA SOC: ${metadata.meddra_soc}`,
      `Definition: ${metadata.definition}`,
      similarity,
    ].join("\n");
  }
  return [
    `CTCAE Term: ${metadata.ctcae_term}`,
    `Grade: ${metadata.grade}`,
    `Description: ${metadata.description}`,
    similarity,
  ].join("\n");
}

/** Term blocks first, then grade blocks, separated by blank lines. */
export function assembleContext(termHits: SearchHit[], gradeHits: SearchHit[]): string {
  return [...termHits, ...gradeHits].map(formatHit).join("\n\n");
}
