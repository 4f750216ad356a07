import type { Server } from 'http';
import type { Express } from 'express';
import { z } from 'zod';
import { createApp } from '../../app';
import type { AppContext } from '../../context';

const envelopeSchema = z.object({
  success: z.boolean(),
  message: z.string(),
  data: z.unknown().optional(),
  error: z
    .object({
      code: z.string().optional(),
      details: z.unknown().optional(),
    })
    .optional(),
});

export type Envelope = z.infer<typeof envelopeSchema>;

export interface TestResponse {
  status: number;
  body: Envelope;
}

export interface RequestOptions {
  body?: unknown;
  token?: string;
  rawBody?: string;
}

export interface TestServer extends ListeningApp {
  request(method: string, path: string, options?: RequestOptions): Promise<TestResponse>;
}

export interface ListeningApp {
  origin: string;
  close(): Promise<void>;
}

/** Serve any express app on an ephemeral port. */
export const listen = async (app: Express): Promise<ListeningApp> => {
  const server = await new Promise<Server>(resolve => {
    const listening = app.listen(0, () => resolve(listening));
  });
  const { port } = z.object({ port: z.number() }).parse(server.address());

  return {
    origin: `http://127.0.0.1:${port}`,
    close() {
      return new Promise<void>((resolve, reject) => {
        server.close(error => (error ? reject(error) : resolve()));
      });
    },
  };
};

/**
 * Serve the storefront app and talk to it with fetch.
 * `path` is relative to /api.
 */
export const startTestServer = async (context: AppContext): Promise<TestServer> => {
  const { origin, close } = await listen(createApp(context));

  return {
    origin,
    close,

    async request(method, path, { body, token, rawBody } = {}) {
      const headers: Record<string, string> = {};
      if (body !== undefined || rawBody !== undefined) {
        headers['Content-Type'] = 'application/json';
      }
      if (token) {
        headers.Authorization = `Bearer ${token}`;
      }

      const response = await fetch(`${origin}/api${path}`, {
        method,
        headers,
        body: rawBody ?? (body === undefined ? undefined : JSON.stringify(body)),
      });
      return { status: response.status, body: envelopeSchema.parse(await response.json()) };
    },
  };
};

/** Narrow `data` to an object carrying a numeric id. */
export const dataId = (body: Envelope): number => z.object({ id: z.number() }).parse(body.data).id;
