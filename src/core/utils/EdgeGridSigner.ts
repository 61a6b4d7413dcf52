import { createHash, createHmac, randomUUID } from 'crypto';
import type { EdgeGridConfig } from '../../config/config';

export interface SignableRequest {
  method: string;
  url: URL;
  body?: string;
}

/**
 * Produit la valeur de l'en-tête Authorization d'une requête.
 */
export interface RequestSigner {
  sign(request: SignableRequest): string;
}

const pad = (n: number): string => String(n).padStart(2, '0');

/** Horodatage EdgeGrid : yyyyMMddTHH:mm:ss+0000 (UTC). */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}` +
    `T${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}+0000`
  );
}

function hmacBase64(key: string, data: string): string {
  return createHmac('sha256', key).update(data).digest('base64');
}

/**
 * Signature EG1-HMAC-SHA256 des requêtes API.
 *
 * La clé de signature est HMAC(clientSecret, timestamp) ; la donnée signée est
 * méthode, schéma, hôte, chemin+requête, en-têtes canoniques (aucun), empreinte
 * du corps (POST uniquement, tronqué à maxBody) et l'en-tête non signé, séparés par des tabulations.
 */
export class EdgeGridSigner implements RequestSigner {
  constructor(
    private readonly credentials: EdgeGridConfig,
    private readonly clock: () => Date = () => new Date(),
    private readonly nonce: () => string = randomUUID,
  ) {}

  public sign(request: SignableRequest): string {
    const timestamp = formatTimestamp(this.clock());
    const unsigned =
      `EG1-HMAC-SHA256 client_token=${this.credentials.clientToken};` +
      `access_token=${this.credentials.accessToken};` +
      `timestamp=${timestamp};nonce=${this.nonce()};`;

    const signingKey = hmacBase64(this.credentials.clientSecret, timestamp);
    const dataToSign = [
      request.method.toUpperCase(),
      request.url.protocol.replace(':', ''),
      request.url.host,
      `${request.url.pathname}${request.url.search}`,
      '',
      this.contentHash(request),
      unsigned,
    ].join('\t');

    return `${unsigned}signature=${hmacBase64(signingKey, dataToSign)}`;
  }

  public contentHash(request: SignableRequest): string {
    if (request.method.toUpperCase() !== 'POST' || !request.body) {
      return '';
    }
    const bytes = Buffer.from(request.body, 'utf-8').subarray(0, this.credentials.maxBody);
    return createHash('sha256').update(bytes).digest('base64');
  }
}
