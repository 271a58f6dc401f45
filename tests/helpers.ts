// =============================================================================
// PDF SCAN — Integration Test Helpers
//
// Runs the app in-process on an ephemeral port and talks to it with fetch.
// Every server gets its own memory backends unless others are passed in.
// =============================================================================

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { Server } from 'http';
import { createApp, AppOptions } from '../src/app';
import { createBackends } from '../src/backends';
import { Backends } from '../src/types/backends';

export interface TestServer {
  baseUrl: string;
  backends: Backends;
  close(): Promise<void>;
}

/** Start the app on 127.0.0.1 with a random free port. */
export async function startServer(
  backends: Backends = createBackends({ kind: 'memory' }),
  options: AppOptions = {}
): Promise<TestServer> {
  const app = createApp(backends, { nodeEnv: 'test', ...options });

  const server: Server = await new Promise(resolve => {
    const s = app.listen(0, '127.0.0.1', () => resolve(s));
  });

  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('Test server is not listening on a TCP port');
  }
  const { port } = address;

  return {
    baseUrl: `http://127.0.0.1:${port}`,
    backends,
    close: () => new Promise<void>((resolve, reject) => {
      server.close(err => (err ? reject(err) : resolve()));
    }),
  };
}

/**
 * Make an API request to a test server.
 * Returns the raw Response object for flexible assertion.
 */
export async function api(
  server: TestServer,
  method: string,
  urlPath: string,
  body?: FormData | object,
): Promise<Response> {
  const headers: Record<string, string> = {};
  const opts: RequestInit = { method, headers };

  if (body instanceof FormData) {
    opts.body = body;
  } else if (body) {
    headers['Content-Type'] = 'application/json';
    opts.body = JSON.stringify(body);
  }

  return fetch(`${server.baseUrl}${urlPath}`, opts);
}

/**
 * Multipart body with one file part named "file".
 */
export function fileForm(
  content: Buffer | string,
  filename: string,
  contentType = 'application/pdf',
  field = 'file',
): FormData {
  const form = new FormData();
  const part = typeof content === 'string' ? content : new Uint8Array(content);
  form.append(field, new Blob([part], { type: contentType }), filename);
  return form;
}

/**
 * Parse JSON response with error context.
 */
export async function json(res: Response): Promise<any> {
  const text = await res.text();
  try {
    return JSON.parse(text);
  } catch {
    throw new Error(`Expected JSON but got: ${text.slice(0, 200)}`);
  }
}

/** Fresh, empty directory under the OS temp dir. */
export function makeTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'pdf-scan-test-'));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}
