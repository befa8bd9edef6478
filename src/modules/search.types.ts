import type { FlightLeg, SearchResponse, ValidationIssue } from "../../services/search/types.js";

export interface ErrorBody {
  error: string;
  code?: string;
  retryable?: boolean;
  errors?: ValidationIssue[];
}

export interface ControllerResult<T> {
  status: number;
  body: T | ErrorBody;
}

export type SearchResult = ControllerResult<SearchResponse>;
export type FlightResult = ControllerResult<FlightLeg>;

export interface InvalidateBody {
  invalidated: boolean | number;
}

export interface RefreshBody {
  fingerprint: string;
  computedAt: Date;
  expiresAt: Date;
  itineraries: number;
  returnItineraries: number;
}
