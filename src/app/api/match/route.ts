/**
 * POST /api/match
 *
 * Standardizes one symptom description to a CTCAE term and grade.
 * Body: { symptom, details? }
 */

import { NextResponse } from "next/server";

import { getSymptomMatcher } from "@/ml/matcher";
import { isMatchFailure } from "@/ml/matcher/types";
import { errorMessage } from "@/ml/matcher/errors";
import { collectErrors, validateMatchRequest } from "@/ml/schemas/validators";

export const runtime = "nodejs";

export async function POST(request: Request) {
  let payload: unknown;
  try {
    payload = await request.json();
  } catch {
    return NextResponse.json({ error: "Invalid JSON body.", details: [] }, { status: 400 });
  }

  if (!validateMatchRequest(payload)) {
    return NextResponse.json(
      { error: "Invalid match request.", details: collectErrors(validateMatchRequest) },
      { status: 400 }
    );
  }

  try {
    const result = await getSymptomMatcher().match(payload.symptom, payload.details ?? "");
    if (isMatchFailure(result)) {
      return NextResponse.json({ error: result.error }, { status: 500 });
    }
    return NextResponse.json(result);
  } catch (error) {
    // matcher construction fails on bad configuration
    return NextResponse.json({ error: errorMessage(error) }, { status: 500 });
  }
}
