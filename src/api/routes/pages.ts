import { Hono } from "hono";
import { html } from "hono/html";
import type { HtmlEscapedString } from "hono/utils/html";
import type { LogEvent } from "../../registry/node-registry.js";
import type { SurfaceDeps } from "../types.js";
import { formatUptime, uptimeSeconds } from "../types.js";

const LOG_VIEW_LIMIT = 200;

function layout(title: string, body: HtmlEscapedString | Promise<HtmlEscapedString>) {
  return html`<!doctype html>
<html lang="en">
  <head>
    <meta charset="utf-8" />
    <title>${title}</title>
    <link rel="icon" href="/favicon.ico" />
    <link rel="stylesheet" href="/static/css/main.css" />
  </head>
  <body>
    <nav><a href="/">Home</a> <a href="/logs">Logs</a> <a href="/health">Health</a></nav>
    ${body}
  </body>
</html>`;
}

function eventRow(event: LogEvent) {
  return html`<tr class="level-${event.logLevel.toLowerCase()}">
      <td>${event.createdAt}</td>
      <td>${event.logLevel}</td>
      <td>${event.message}</td>
      <td><code>${event.content}</code></td>
    </tr>`;
}

export function createPageRoutes(deps: SurfaceDeps): Hono {
  const routes = new Hono();

  routes.get("/", (c) => {
    const { identity } = deps;
    return c.html(
      layout(
        identity.name,
        html`<main>
      <h1>${identity.name}</h1>
      <dl>
        <dt>Version</dt><dd>${identity.version}</dd>
        <dt>Server</dt><dd>${identity.server}</dd>
        <dt>Node</dt><dd>#${deps.nodeId} (${deps.role})</dd>
        <dt>Uptime</dt><dd>${formatUptime(uptimeSeconds(deps))}</dd>
      </dl>
    </main>`,
      ),
    );
  });

  routes.get("/logs", (c) => {
    const events = deps.registry.listEvents(deps.nodeId, LOG_VIEW_LIMIT);
    const rows =
      events.length > 0
        ? events.map(eventRow)
        : html`<tr><td colspan="4">No events recorded for this node.</td></tr>`;

    return c.html(
      layout(
        `${deps.identity.name} logs`,
        html`<main>
      <h1>Logs for node #${deps.nodeId}</h1>
      <table>
        <thead><tr><th>Time</th><th>Level</th><th>Message</th><th>Content</th></tr></thead>
        <tbody>${rows}</tbody>
      </table>
    </main>`,
      ),
    );
  });

  return routes;
}
