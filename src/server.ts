import http from "http";
import { readBody, sendJson } from "./http/httpIO";
import { handleRequest, type AppDeps } from "./http/routes";

export const createServer = (deps: AppDeps) => {
  return http.createServer((req, res) => {
    handleRequest(deps, {
      method: req.method ?? "GET",
      url: req.url ?? "/",
      readBody: () => readBody(req)
    })
      .then((response) => sendJson(res, response))
      .catch((err: unknown) => {
        const message = err instanceof Error ? err.message : String(err);
        console.error(JSON.stringify({ event: "http.unhandled_error", message }));
        if (!res.headersSent) {
          sendJson(res, { status: 500, body: { error: "internal server error" } });
        } else {
          res.end();
        }
      });
  });
};

if (require.main === module) {
  // The composition root imports createServer, so it is loaded lazily here.
  import("./composition/root")
    .then(({ startService }) => startService())
    .catch((err: unknown) => {
      const message = err instanceof Error ? err.message : String(err);
      console.error(JSON.stringify({ event: "server.start_failed", message }));
      process.exit(1);
    });
}
