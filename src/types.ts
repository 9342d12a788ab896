export type SearchItem = {
  link: string;
  title: string;
  snippet: string;
};

export type SearchOutcome =
  | { kind: "ok"; items: SearchItem[] }
  | { kind: "rate-limited" }
  | { kind: "failed"; error: string };

export interface SearchProvider {
  readonly requests: number;
  search(query: string, start: number, signal?: AbortSignal): Promise<SearchOutcome>;
}

export type EmailPolicy = "single" | "multi";

export type Employee = {
  name: string;
  profile_url: string;
  snippet: string;
  inferred_emails: string[];
};

export type HarvestState = "idle" | "running" | "completed" | "interrupted" | "failed";

export type Metrics = {
  organization: string;
  timestamp: string; // ISO, run start
  api_requests: number;
  profiles_found: number;
  execution_time_seconds: number;
  queries: number;
  state: HarvestState;
};

export type HarvestSummary = {
  state: HarvestState;
  employees: Employee[];
  metrics: Metrics;
};
