import { createHash, createHmac } from 'crypto';
import { EdgeGridSigner, formatTimestamp } from '../../core/utils/EdgeGridSigner';
import { testCredentials } from '../helpers/fakeApi';

const hmac = (key: string, data: string): string => createHmac('sha256', key).update(data).digest('base64');

describe('EdgeGridSigner', () => {
  const clock = (): Date => new Date(Date.UTC(2024, 0, 2, 3, 4, 5));
  const nonce = (): string => 'nonce-1';
  const timestamp = '20240102T03:04:05+0000';
  const unsigned = `EG1-HMAC-SHA256 client_token=test-client-token;access_token=test-access-token;timestamp=${timestamp};nonce=nonce-1;`;

  it('formate l’horodatage en UTC', () => {
    expect(formatTimestamp(clock())).toBe(timestamp);
  });

  it('signe une requête GET', () => {
    const signer = new EdgeGridSigner(testCredentials, clock, nonce);
    const url = new URL('https://test-host/appsec/v1/configs?x=1');

    const header = signer.sign({ method: 'get', url });

    const data = ['GET', 'https', 'test-host', '/appsec/v1/configs?x=1', '', '', unsigned].join('\t');
    expect(header).toBe(`${unsigned}signature=${hmac(hmac('test-secret', timestamp), data)}`);
  });

  it('inclut l’empreinte du corps pour un POST', () => {
    const signer = new EdgeGridSigner(testCredentials, clock, nonce);
    const url = new URL('https://test-host/appsec/v1/configs');
    const body = '{"createFrom":{"configId":5}}';

    const header = signer.sign({ method: 'POST', url, body });

    const hash = createHash('sha256').update(body).digest('base64');
    const data = ['POST', 'https', 'test-host', '/appsec/v1/configs', '', hash, unsigned].join('\t');
    expect(header).toBe(`${unsigned}signature=${hmac(hmac('test-secret', timestamp), data)}`);
  });

  it('tronque le corps haché à maxBody et ignore les corps hors POST', () => {
    const signer = new EdgeGridSigner({ ...testCredentials, maxBody: 4 }, clock, nonce);
    const url = new URL('https://test-host/x');

    expect(signer.contentHash({ method: 'POST', url, body: 'abcdefgh' })).toBe(createHash('sha256').update('abcd').digest('base64'));
    expect(signer.contentHash({ method: 'PUT', url, body: 'abcdefgh' })).toBe('');
    expect(signer.contentHash({ method: 'POST', url })).toBe('');
  });
});
