import type { SearchCoordinator } from "../../services/search/search.service.js";
import { FlightParamsSchema, parseSearchInput, toValidationIssues } from "./search.validator.js";
import type { FlightResult, SearchResult } from "./search.types.js";

export async function search(
  coordinator: SearchCoordinator,
  queryParams: unknown,
  signal?: AbortSignal
): Promise<SearchResult> {
  const input = parseSearchInput(queryParams);
  if (!input.ok) {
    return { status: 400, body: { error: "Invalid search parameters", errors: input.issues } };
  }

  const response = await coordinator.search(input.criteria, { signal });
  return { status: response.errors.length > 0 ? 400 : 200, body: response };
}

export async function getFlight(coordinator: SearchCoordinator, params: unknown): Promise<FlightResult> {
  const parsed = FlightParamsSchema.safeParse(params);
  if (!parsed.success) {
    return { status: 400, body: { error: "Invalid flight id", errors: toValidationIssues(parsed.error) } };
  }

  const leg = await coordinator.getFlight(parsed.data.flightId);
  if (!leg) {
    return { status: 404, body: { error: `Flight not found: ${parsed.data.flightId}` } };
  }
  return { status: 200, body: leg };
}
