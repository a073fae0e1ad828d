import { describe, it, expect, vi } from "vitest";
import { SymptomMatcher } from "../ml/matcher/symptom_matcher";
import type { Generator } from "../ml/matcher/generator";
import type { DocumentSearch } from "../ml/rag/retrieve";
import type { DocType, SearchHit } from "../ml/rag/types";
import { HEADACHE, NAUSEA, gradeHit, termHit, testLogger } from "./helpers/ctcae_fixtures";

const SYMPTOM = "severe headache with nausea";

function fakeRetriever(termHits: SearchHit[], gradeHits: SearchHit[]) {
  const search = vi.fn(async (_query: string, _k: number, kind: DocType) =>
    kind === "term" ? termHits : gradeHits
  );
  const retriever: DocumentSearch = { search };
  return { retriever, search };
}

function fakeGenerator(reply: (context: string) => Promise<string>) {
  const generate = vi.fn(async (_symptom: string, _details: string, context: string) => reply(context));
  const generator: Generator = { generate };
  return { generator, generate };
}

describe("SymptomMatcher", () => {
  it("runs the term and grade searches with their own k and query", async () => {
    const { retriever, search } = fakeRetriever([termHit(HEADACHE, 0.9)], [gradeHit(HEADACHE, 2, 0.8)]);
    const { generator, generate } = fakeGenerator(async () => '{"ctcae_term": "Headache", "grade": "3"}');
    const matcher = new SymptomMatcher({ retriever, generator, logger: testLogger() });

    const result = await matcher.match(SYMPTOM);

    expect(search).toHaveBeenCalledTimes(2);
    expect(search).toHaveBeenCalledWith(SYMPTOM, 3, "term");
    expect(search).toHaveBeenCalledWith(`${SYMPTOM} `, 5, "grade_description");
    expect(generate).toHaveBeenCalledWith(SYMPTOM, "", expect.any(String));
    expect(result).toEqual({ original_symptom: SYMPTOM, ctcae_term: "Headache", grade: "3" });
  });

  it("appends details to the grade query and passes custom k values", async () => {
    const { retriever, search } = fakeRetriever([], []);
    const { generator } = fakeGenerator(async () => "{}");
    const matcher = new SymptomMatcher({ retriever, generator, logger: testLogger(), termK: 2, gradeK: 7 });

    const result = await matcher.match("nausea", "since yesterday");

    expect(search).toHaveBeenCalledWith("nausea", 2, "term");
    expect(search).toHaveBeenCalledWith("nausea since yesterday", 7, "grade_description");
    expect(result).toEqual({ original_symptom: "nausea", details: "since yesterday" });
  });

  it("places term evidence before grade evidence in the context", async () => {
    const { retriever } = fakeRetriever([termHit(HEADACHE, 0.9)], [gradeHit(NAUSEA, 0, 0.7)]);
    const { generator, generate } = fakeGenerator(async () => "{}");
    const matcher = new SymptomMatcher({ retriever, generator, logger: testLogger() });

    await matcher.match(SYMPTOM);

    const context = String(generate.mock.calls[0]?.[2]);
    expect(context.indexOf("MedDRA SOC: Nervous system disorders")).toBeLessThan(context.indexOf("Grade: 1"));
    expect(context.startsWith("CTCAE Term: Headache\n")).toBe(true);
  });

  it("still asks the model when both searches come back empty", async () => {
    const { retriever } = fakeRetriever([], []);
    const { generator, generate } = fakeGenerator(async () => "I cannot determine a match.");
    const logger = testLogger();
    const matcher = new SymptomMatcher({ retriever, generator, logger });

    const result = await matcher.match(SYMPTOM);

    expect(generate).toHaveBeenCalledWith(SYMPTOM, "", "");
    expect(result).toEqual({
      original_symptom: SYMPTOM,
      error: "Failed to parse LLM response as JSON",
      raw_response: "I cannot determine a match.",
    });
    expect(logger.entries).toContainEqual(
      expect.objectContaining({ level: "warn", message: "match failed at PARSE: Failed to parse LLM response as JSON" })
    );
  });

  it("turns a generation error into a failure without raw text", async () => {
    const { retriever } = fakeRetriever([], []);
    const { generator } = fakeGenerator(async () => {
      throw new Error("rate limited");
    });
    const logger = testLogger();
    const matcher = new SymptomMatcher({ retriever, generator, logger });

    const result = await matcher.match(SYMPTOM, "two days");

    expect(result).toEqual({ original_symptom: SYMPTOM, details: "two days", error: "rate limited" });
    expect(logger.entries).toContainEqual(
      expect.objectContaining({ level: "warn", message: "match failed at GENERATE: rate limited" })
    );
  });

  it("logs each stage it reaches", async () => {
    const { retriever } = fakeRetriever([], []);
    const { generator } = fakeGenerator(async () => "{}");
    const logger = testLogger();
    const matcher = new SymptomMatcher({ retriever, generator, logger });

    await matcher.match(SYMPTOM);

    const stages = logger.entries
      .map((entry) => entry.message)
      .filter((message) => message.startsWith("stage "));
    expect(stages).toEqual([
      "stage INIT",
      "stage RETRIEVE_TERMS",
      "stage RETRIEVE_GRADES",
      "stage ASSEMBLE_CONTEXT",
      "stage GENERATE",
      "stage PARSE",
      "stage DONE",
    ]);
  });

  it("fails once the deadline passes", async () => {
    const { retriever } = fakeRetriever([], []);
    const { generator } = fakeGenerator(() => new Promise<string>(() => undefined));
    const matcher = new SymptomMatcher({ retriever, generator, logger: testLogger(), timeoutMs: 25 });

    const result = await matcher.match(SYMPTOM);

    expect(result).toEqual({ original_symptom: SYMPTOM, error: "Symptom matching timed out after 25ms" });
  });

  it("caps a deadline longer than a timer can hold instead of firing at once", async () => {
    const { retriever } = fakeRetriever([], []);
    const { generator } = fakeGenerator(
      () => new Promise<string>((resolve) => setTimeout(() => resolve('{"ctcae_term": "Headache"}'), 30))
    );
    const matcher = new SymptomMatcher({ retriever, generator, logger: testLogger(), timeoutMs: 3_000_000_000 });

    const result = await matcher.match(SYMPTOM);

    expect(result).toEqual({ original_symptom: SYMPTOM, ctcae_term: "Headache" });
  });

  it("rejects a blank symptom without touching the backends", async () => {
    const { retriever, search } = fakeRetriever([], []);
    const { generator, generate } = fakeGenerator(async () => "{}");
    const matcher = new SymptomMatcher({ retriever, generator, logger: testLogger() });

    const result = await matcher.match("   ");

    expect(result).toEqual({ original_symptom: "   ", error: "Symptom must be a non-empty string" });
    expect(search).not.toHaveBeenCalled();
    expect(generate).not.toHaveBeenCalled();
  });
});
