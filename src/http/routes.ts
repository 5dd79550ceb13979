import { HousingImportError } from "../application/import-housing/import.error-handler";
import { importHousing } from "../application/import-housing/importHousing.usecase";
import { JobQueueFullError, type JobRunner } from "../application/process-jobs/jobRunner";
import {
  housingStats,
  InvalidQueryError,
  queryHousing,
  resolveChartFilters,
  resolveHousingFilters
} from "../application/query-housing/queryHousing.usecase";
import type { HousingRepository } from "../ports/HousingRepository";
import { HttpError, parseJsonObject, type HttpResponse } from "./httpIO";

export type AppDeps = {
  jobs: JobRunner;
  housing: HousingRepository;
  serviceName?: string;
  now?: () => Date;
};

export type IncomingRequest = {
  method: string;
  url: string;
  readBody: () => Promise<string>;
};

type RouteContext = {
  deps: AppDeps;
  params: string[];
  query: URLSearchParams;
  readBody: () => Promise<string>;
};

type Route = {
  method: "GET" | "POST";
  pattern: RegExp;
  handler: (ctx: RouteContext) => Promise<HttpResponse>;
};

const toErrorMessage = (reason: unknown): string => {
  if (reason instanceof Error) return reason.message;
  return String(reason);
};

const logFailure = (event: string, err: unknown) => {
  console.error(JSON.stringify({ event, message: toErrorMessage(err) }));
};

const health = async ({ deps }: RouteContext): Promise<HttpResponse> => ({
  status: 200,
  body: {
    status: "healthy",
    service: deps.serviceName ?? "housing-jobs-service",
    timestamp: (deps.now ?? (() => new Date()))().toISOString()
  }
});

const submitJob = async ({ deps, readBody }: RouteContext): Promise<HttpResponse> => {
  const body = parseJsonObject(await readBody());
  if (!("data" in body)) {
    return { status: 400, body: { error: "missing data field" } };
  }

  try {
    const jobId = await deps.jobs.submit(body.data);
    return { status: 202, body: { message: "job queued successfully", job_id: jobId, status: "queued" } };
  } catch (err) {
    if (err instanceof JobQueueFullError) {
      return { status: 503, body: { error: "job queue is full" } };
    }
    logFailure("http.job_submit_failed", err);
    return { status: 500, body: { error: "failed to queue job" } };
  }
};

const getJob = async ({ deps, params }: RouteContext): Promise<HttpResponse> => {
  try {
    const view = await deps.jobs.getStatus(params[0]);
    if (!view) {
      return { status: 404, body: { error: "job not found" } };
    }
    return { status: 200, body: view };
  } catch (err) {
    logFailure("http.job_lookup_failed", err);
    return { status: 500, body: { error: "failed to fetch job status" } };
  }
};

const getStats = async ({ deps }: RouteContext): Promise<HttpResponse> => {
  try {
    return { status: 200, body: await deps.jobs.stats() };
  } catch (err) {
    logFailure("http.stats_failed", err);
    return { status: 500, body: { error: "failed to fetch statistics" } };
  }
};

const importHousingCsv = async ({ deps, readBody }: RouteContext): Promise<HttpResponse> => {
  const body = parseJsonObject(await readBody());
  if (typeof body.csv_data !== "string") {
    return { status: 400, body: { error: "missing csv_data field" } };
  }

  try {
    const result = await importHousing({ repo: deps.housing }, { kind: "text", text: body.csv_data });
    return {
      status: 200,
      body: {
        message: "data imported successfully",
        rows_imported: result.rowsRead,
        rows_affected: result.rowsAffected
      }
    };
  } catch (err) {
    const code = err instanceof HousingImportError ? err.code : undefined;
    console.error(JSON.stringify({ event: "housing.import_failed", code, message: toErrorMessage(err) }));
    return { status: 500, body: { error: `failed to import data: ${toErrorMessage(err)}` } };
  }
};

const getHousingData = async ({ deps, query }: RouteContext): Promise<HttpResponse> => {
  try {
    const filters = resolveHousingFilters({
      location: query.get("location"),
      type: query.get("type"),
      start_date: query.get("start_date"),
      end_date: query.get("end_date")
    });
    const data = await queryHousing({ repo: deps.housing }, filters);
    return { status: 200, body: { count: data.length, data } };
  } catch (err) {
    if (err instanceof InvalidQueryError) {
      return { status: 400, body: { error: err.message } };
    }
    logFailure("http.housing_query_failed", err);
    return { status: 500, body: { error: "failed to fetch data" } };
  }
};

const getHousingCharts = async ({ deps, query }: RouteContext): Promise<HttpResponse> => {
  try {
    const filters = resolveChartFilters({
      chart_type: query.get("chart_type"),
      location: query.get("location"),
      type: query.get("type"),
      start_date: query.get("start_date"),
      end_date: query.get("end_date")
    });
    const data = await queryHousing({ repo: deps.housing }, filters);
    return { status: 200, body: { count: data.length, data } };
  } catch (err) {
    if (err instanceof InvalidQueryError) {
      return { status: 400, body: { error: err.message } };
    }
    logFailure("http.housing_charts_failed", err);
    return { status: 500, body: { error: "failed to fetch data" } };
  }
};

const getHousingStats = async ({ deps, query }: RouteContext): Promise<HttpResponse> => {
  try {
    const stats = await housingStats(
      { repo: deps.housing },
      { location: query.get("location"), type: query.get("type") }
    );
    if (!stats) {
      return { status: 404, body: { error: "no data found" } };
    }
    return { status: 200, body: stats };
  } catch (err) {
    if (err instanceof InvalidQueryError) {
      return { status: 400, body: { error: err.message } };
    }
    logFailure("http.housing_stats_failed", err);
    return { status: 500, body: { error: "failed to fetch statistics" } };
  }
};

export const routes: Route[] = [
  { method: "GET", pattern: /^\/health$/, handler: health },
  { method: "POST", pattern: /^\/api\/process$/, handler: submitJob },
  { method: "GET", pattern: /^\/api\/jobs\/([^/]+)$/, handler: getJob },
  { method: "GET", pattern: /^\/api\/stats$/, handler: getStats },
  { method: "POST", pattern: /^\/api\/housing\/import$/, handler: importHousingCsv },
  { method: "GET", pattern: /^\/api\/housing\/data$/, handler: getHousingData },
  { method: "GET", pattern: /^\/api\/housing\/stats$/, handler: getHousingStats },
  { method: "GET", pattern: /^\/api\/housing\/charts$/, handler: getHousingCharts }
];

const decodeParams = (match: RegExpExecArray): string[] | undefined => {
  try {
    return match.slice(1).map((param) => decodeURIComponent(param));
  } catch {
    return undefined;
  }
};

/**
 * Maps one request to a response. Never throws: anything unexpected becomes a 500.
 */
export const handleRequest = async (deps: AppDeps, req: IncomingRequest): Promise<HttpResponse> => {
  const url = new URL(req.url, "http://localhost");
  const pathname = url.pathname.length > 1 ? url.pathname.replace(/\/+$/, "") : url.pathname;

  if (req.method === "OPTIONS") {
    return { status: 204 };
  }

  const matching = routes
    .map((route) => ({ route, match: route.pattern.exec(pathname) }))
    .filter((candidate): candidate is { route: Route; match: RegExpExecArray } => candidate.match !== null);

  if (matching.length === 0) {
    return { status: 404, body: { error: "not found" } };
  }

  const hit = matching.find((candidate) => candidate.route.method === req.method);
  if (!hit) {
    return { status: 405, body: { error: "method not allowed" } };
  }

  const params = decodeParams(hit.match);
  if (!params) {
    return { status: 404, body: { error: "not found" } };
  }

  try {
    return await hit.route.handler({ deps, params, query: url.searchParams, readBody: req.readBody });
  } catch (err) {
    if (err instanceof HttpError) {
      return { status: err.status, body: { error: err.message } };
    }
    console.error(JSON.stringify({ event: "http.request_failed", method: req.method, path: pathname, message: toErrorMessage(err) }));
    return { status: 500, body: { error: "internal server error" } };
  }
};
