import { Request, Response as ExpressResponse } from 'express';
import { componentLogger } from '../../shared/logger';

interface ForwarderOptions {
  upstreamUrl: string;
  timeoutMs: number;
}

// Connection-scoped headers are never relayed across a proxy hop
const HOP_BY_HOP_HEADERS = new Set([
  'connection',
  'keep-alive',
  'proxy-authenticate',
  'proxy-authorization',
  'te',
  'trailer',
  'transfer-encoding',
  'upgrade',
  'host',
  'content-length',
]);

// fetch hands back a decoded body, so the upstream's encoding no longer applies
const STRIPPED_RESPONSE_HEADERS = new Set([...HOP_BY_HOP_HEADERS, 'content-encoding']);

const log = componentLogger('forwarder');

export function toFetchHeaders(headers: Request['headers']): Headers {
  const out = new Headers();
  for (const [name, value] of Object.entries(headers)) {
    if (value === undefined || HOP_BY_HOP_HEADERS.has(name)) continue;
    if (Array.isArray(value)) {
      for (const item of value) out.append(name, item);
    } else {
      out.set(name, value);
    }
  }
  return out;
}

/**
 * Final stage of the chain: relays the admitted request, identity headers
 * included, to the configured upstream and relays its answer back.
 */
export function createUpstreamForwarder(options: ForwarderOptions) {
  const base = options.upstreamUrl.replace(/\/+$/, '');

  return async (req: Request, res: ExpressResponse): Promise<void> => {
    const target = `${base}${req.originalUrl}`;
    const hasBody = req.method !== 'GET' && req.method !== 'HEAD' && Buffer.isBuffer(req.body);

    let upstream: Response;
    let payload: Buffer;
    try {
      upstream = await fetch(target, {
        method: req.method,
        headers: toFetchHeaders(req.headers),
        body: hasBody ? req.body : undefined,
        redirect: 'manual',
        signal: AbortSignal.timeout(options.timeoutMs),
      });
      payload = Buffer.from(await upstream.arrayBuffer());
    } catch (error) {
      log.error({ err: error, target }, 'Upstream request failed');
      res.status(502).json({ error: 'Upstream unavailable' });
      return;
    }

    res.status(upstream.status);
    upstream.headers.forEach((value, name) => {
      if (!STRIPPED_RESPONSE_HEADERS.has(name)) {
        res.setHeader(name, value);
      }
    });

    log.debug({ target, status: upstream.status, subject: req.identity?.subject }, 'Forwarded');
    res.end(payload);
  };
}
