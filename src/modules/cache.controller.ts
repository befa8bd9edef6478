import type { SearchCoordinator } from "../../services/search/search.service.js";
import { IngestionCompleteSchema, parseSearchInput, toValidationIssues } from "./search.validator.js";
import type { ControllerResult, InvalidateBody, RefreshBody } from "./search.types.js";

/** POST /cache/invalidate: drop the entry for the criteria in the body. */
export async function invalidate(coordinator: SearchCoordinator, body: unknown): Promise<ControllerResult<InvalidateBody>> {
  const input = parseSearchInput(body);
  if (!input.ok) return { status: 400, body: { error: "Invalid search parameters", errors: input.issues } };

  const result = coordinator.invalidate(input.criteria);
  if (!result.ok) return { status: 400, body: { error: "Invalid search parameters", errors: result.error } };
  return { status: 200, body: { invalidated: result.value } };
}

/** POST /cache/refresh: recompute the entry for the criteria in the body. */
export async function refresh(coordinator: SearchCoordinator, body: unknown): Promise<ControllerResult<RefreshBody>> {
  const input = parseSearchInput(body);
  if (!input.ok) return { status: 400, body: { error: "Invalid search parameters", errors: input.issues } };

  const entry = await coordinator.refresh(input.criteria);
  return {
    status: 200,
    body: {
      fingerprint: entry.fingerprint,
      computedAt: entry.computedAt,
      expiresAt: entry.expiresAt,
      itineraries: entry.itineraries.length,
      returnItineraries: entry.returnItineraries.length,
    },
  };
}

/** POST /cache/ingestion-complete: schedule data for a range finished loading. */
export async function ingestionComplete(
  coordinator: SearchCoordinator,
  body: unknown
): Promise<ControllerResult<InvalidateBody>> {
  const parsed = IngestionCompleteSchema.safeParse(body ?? {});
  if (!parsed.success) {
    return { status: 400, body: { error: "Invalid date range", errors: toValidationIssues(parsed.error) } };
  }
  const { start, end } = parsed.data;
  return { status: 200, body: { invalidated: coordinator.onIngestionCompleted({ start, end: end ?? start }) } };
}
