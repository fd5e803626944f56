/**
 * Delivery mechanisms for the transport fallback chain.
 *
 * Each one gets a request to the store its own way; they are tried in the
 * configured order until one gets an answer.
 */
import * as child_process from "node:child_process";
import * as http from "node:http";
import * as https from "node:https";
import type { MechanismName } from "../config/types.js";
import type { HttpMechanism, HttpRequest, HttpResponse } from "./transport.js";

/**
 * Node's built-in fetch.
 */
export class FetchMechanism implements HttpMechanism {
    readonly name = "fetch";

    async send(request: HttpRequest): Promise<HttpResponse> {
        const response = await fetch(request.url, {
            method: request.method,
            headers: request.headers,
            body: request.body,
            signal: AbortSignal.timeout(request.timeoutMs),
        });
        return { status: response.status, body: await response.text() };
    }
}

/**
 * A spawned curl process. The body goes through stdin; the status code is
 * appended to stdout on a line of its own.
 */
export class CurlMechanism implements HttpMechanism {
    readonly name = "curl";

    constructor(private command = "curl") {}

    send(request: HttpRequest): Promise<HttpResponse> {
        const args = [
            "--silent",
            "--show-error",
            "--request",
            request.method,
            "--max-time",
            String(Math.max(1, Math.ceil(request.timeoutMs / 1000))),
            "--write-out",
            "\n%{http_code}",
        ];
        for (const [name, value] of Object.entries(request.headers)) {
            args.push("--header", `${name}: ${value}`);
        }
        if (request.body !== undefined) {
            args.push("--data-binary", "@-");
        }
        args.push(request.url);

        return new Promise((resolve, reject) => {
            const child = child_process.spawn(this.command, args, { windowsHide: true });
            const stdout: Buffer[] = [];
            const stderr: Buffer[] = [];
            let settled = false;

            const timer = setTimeout(() => {
                child.kill();
                finish(new Error(`curl timed out after ${request.timeoutMs}ms`));
            }, request.timeoutMs + 1000);

            function finish(err: Error | null, response?: HttpResponse): void {
                if (settled) return;
                settled = true;
                clearTimeout(timer);
                if (err !== null) reject(err);
                else if (response !== undefined) resolve(response);
            }

            child.stdout.on("data", (chunk: Buffer) => stdout.push(chunk));
            child.stderr.on("data", (chunk: Buffer) => stderr.push(chunk));
            child.on("error", (err) => finish(err));
            child.on("close", (code) => {
                if (code !== 0) {
                    const detail = Buffer.concat(stderr).toString("utf-8").trim();
                    finish(new Error(`curl exited with code ${code}${detail ? `: ${detail}` : ""}`));
                    return;
                }
                const output = Buffer.concat(stdout).toString("utf-8");
                const split = output.lastIndexOf("\n");
                const status = parseInt(output.slice(split + 1), 10);
                if (split === -1 || isNaN(status)) {
                    finish(new Error("curl did not report a status code"));
                    return;
                }
                finish(null, { status, body: output.slice(0, split) });
            });

            child.stdin.on("error", () => {
                // curl exited before reading the body; "close" reports why
            });
            child.stdin.end(request.body ?? "");
        });
    }
}

/**
 * A plain node:https (or node:http) request.
 */
export class NodeHttpMechanism implements HttpMechanism {
    readonly name = "node-http";

    send(request: HttpRequest): Promise<HttpResponse> {
        const url = new URL(request.url);
        const headers: Record<string, string | number> = { ...request.headers };
        if (request.body !== undefined) {
            headers["Content-Length"] = Buffer.byteLength(request.body);
        }
        const options: http.RequestOptions = {
            method: request.method,
            headers,
            timeout: request.timeoutMs,
        };

        return new Promise((resolve, reject) => {
            const onResponse = (res: http.IncomingMessage): void => {
                const chunks: Buffer[] = [];
                res.on("data", (chunk: Buffer) => chunks.push(chunk));
                res.on("error", reject);
                res.on("end", () => {
                    resolve({
                        status: res.statusCode ?? 0,
                        body: Buffer.concat(chunks).toString("utf-8"),
                    });
                });
            };
            const req = url.protocol === "http:"
                ? http.request(url, options, onResponse)
                : https.request(url, options, onResponse);
            req.on("timeout", () => {
                req.destroy(new Error(`Request timed out after ${request.timeoutMs}ms`));
            });
            req.on("error", reject);
            if (request.body !== undefined) {
                req.write(request.body);
            }
            req.end();
        });
    }
}

/**
 * Build the fallback chain in the configured order.
 */
export function createMechanisms(names: readonly MechanismName[]): HttpMechanism[] {
    return names.map((name) => {
        switch (name) {
            case "fetch":
                return new FetchMechanism();
            case "curl":
                return new CurlMechanism();
            case "node-http":
                return new NodeHttpMechanism();
        }
    });
}
