/**
 * iDEAL API Client
 *
 * Low-level HTTPS transport. Requests are posted with the merchant's client
 * certificate; the acquirer's server certificate is verified against the
 * system trust store unless `ca` names other roots.
 */

import https from 'https';
import { GatewayError } from '../types';

const HTTP_TIMEOUT = 30000;

export interface PostOptions {
  headers: Record<string, string>;
  /** PEM private key presented for TLS client authentication. */
  clientKey?: string;
  clientCertificate?: string;
  passphrase?: string;
}

/**
 * Posts a signed request and returns the response body
 */
export interface SecureTransport {
  post(url: string, body: string, options: PostOptions): Promise<string>;
}

export interface HttpsTransportOptions {
  /** Milliseconds of socket inactivity before the request fails with TIMEOUT. */
  timeout?: number;
  /** Trusted roots replacing the system store. */
  ca?: string | Buffer | Array<string | Buffer>;
  agent?: https.Agent;
}

export class HttpsTransport implements SecureTransport {
  private readonly timeout: number;
  private readonly ca?: string | Buffer | Array<string | Buffer>;
  private readonly agent?: https.Agent;

  constructor(options: HttpsTransportOptions = {}) {
    this.timeout = options.timeout ?? HTTP_TIMEOUT;
    this.ca = options.ca;
    this.agent = options.agent;
  }

  post(url: string, body: string, options: PostOptions): Promise<string> {
    return new Promise<string>((resolve, reject) => {
      const payload = Buffer.from(body, 'utf8');

      const request = https.request(
        url,
        {
          method: 'POST',
          headers: { ...options.headers, 'Content-Length': String(payload.length) },
          key: options.clientKey,
          cert: options.clientCertificate,
          passphrase: options.passphrase,
          ca: this.ca,
          agent: this.agent,
          rejectUnauthorized: true,
          timeout: this.timeout,
        },
        (response) => {
          const chunks: Buffer[] = [];

          response.on('data', (chunk: Buffer) => chunks.push(chunk));
          response.on('error', (error) => reject(toGatewayError(error)));
          response.on('end', () => {
            const text = Buffer.concat(chunks).toString('utf8');
            const status = response.statusCode ?? 0;

            if (status >= 400) {
              reject(
                new GatewayError(
                  `iDEAL API HTTP error: ${status} ${response.statusMessage ?? ''}`.trim(),
                  'ideal',
                  'HTTP_ERROR',
                  text
                )
              );
              return;
            }

            resolve(text);
          });
        }
      );

      request.on('timeout', () => {
        request.destroy(new GatewayError('iDEAL API request timeout', 'ideal', 'TIMEOUT'));
      });
      request.on('error', (error) => reject(toGatewayError(error)));

      request.end(payload);
    });
  }
}

function toGatewayError(error: unknown): GatewayError {
  if (error instanceof GatewayError) {
    return error;
  }

  const message = error instanceof Error ? error.message : 'Unknown error';
  return new GatewayError(`iDEAL API request failed: ${message}`, 'ideal', 'REQUEST_FAILED');
}
