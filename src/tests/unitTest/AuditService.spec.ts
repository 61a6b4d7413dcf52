import * as fs from 'fs/promises';
import * as path from 'path';
import { createHmac } from 'crypto';
import { AuditService, FileAuditTransport, AuditEvent, AuditTransport, stableStringify } from '../../core/utils/AuditService';

async function readEntries(file: string): Promise<AuditEvent[]> {
  const data = await fs.readFile(file, 'utf-8');
  return data
    .trim()
    .split('\n')
    .map((line) => JSON.parse(line));
}

describe('AuditService', () => {
  const fixturesDir = path.resolve(__dirname, 'fixtures');
  const logFile = path.join(fixturesDir, 'audit.service.log');

  beforeAll(async () => {
    await fs.mkdir(fixturesDir, { recursive: true });
    await fs.rm(logFile, { force: true });
  });

  beforeEach(() => {
    AuditService.reset();
  });

  it('exige des transports à la première initialisation', () => {
    expect(() => AuditService.getInstance()).toThrow('AuditService must be initialized with transports');
  });

  it('should log an event without HMAC signature', async () => {
    const service = AuditService.getInstance([new FileAuditTransport(logFile)]);
    await service.log({
      actor: 'test',
      event: 'TEST_EVENT',
      resource: 'res1',
      status: 'SUCCESS',
      details: { foo: 'bar' },
    });

    const entries = await readEntries(logFile);
    expect(entries).toHaveLength(1);
    const entry = entries[0];
    expect(entry.actor).toBe('test');
    expect(entry.event).toBe('TEST_EVENT');
    expect(entry.details).toEqual({ foo: 'bar' });
    expect(entry.hmac).toBeUndefined();
    expect(entry.timestamp).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/);
  });

  it('should log an event with HMAC signature', async () => {
    const hmacKey = 'test-secret';
    const service = AuditService.getInstance([new FileAuditTransport(logFile)], hmacKey);
    await service.log({ actor: 'test2', event: 'TEST_HMAC', resource: 'res2' });

    const entries = await readEntries(logFile);
    expect(entries).toHaveLength(2);

    const { hmac, ...signedData } = entries[1];
    const expected = createHmac('sha256', hmacKey).update(stableStringify(signedData)).digest('hex');
    expect(hmac).toBe(expected);
  });

  it('stableStringify trie les clés et ignore les valeurs undefined', () => {
    expect(stableStringify({ b: 1, a: [{ d: 2, c: undefined }], e: null })).toBe('{"a":[{"d":2}],"b":1,"e":null}');
  });

  it('beginOperation/endOperation partagent le même operation_id', async () => {
    const events: AuditEvent[] = [];
    const memory: AuditTransport = {
      log: async (event) => {
        events.push(event);
      },
    };
    const service = AuditService.getInstance([memory]);

    const { operationId } = await service.beginOperation({ actor: 'AppSecClient', operation: 'GetVersionNotes', method: 'GET', path: '/x' });
    await service.endOperation(operationId, 'GetVersionNotes', 'FAILURE', { httpStatus: 404, error: new Error('boom') });

    expect(events.map((e) => [e.event, e.status, e.resource])).toEqual([
      ['OPERATION_START', 'STARTED', 'GetVersionNotes'],
      ['OPERATION_FAILURE', 'FAILURE', 'GetVersionNotes'],
    ]);
    expect(events[0].details).toEqual({ method: 'GET', path: '/x', operation_id: operationId });
    expect(events[1].details).toEqual({ operation_id: operationId, http_status: 404, error: { name: 'Error', message: 'boom' } });
  });

  it('un transport en échec ne fait pas échouer log()', async () => {
    const consoleSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    const broken: AuditTransport = { log: () => Promise.reject(new Error('disk full')) };
    const service = AuditService.getInstance([broken]);

    await expect(service.log({ actor: 'test', event: 'X' })).resolves.toBeUndefined();
    expect(consoleSpy).toHaveBeenCalledWith('AuditService transport error:', expect.any(Error));

    consoleSpy.mockRestore();
  });

  it('configureFromEnv sans AUDIT_ENABLED crée une instance sans transport', async () => {
    const previous = process.env.AUDIT_ENABLED;
    delete process.env.AUDIT_ENABLED;
    try {
      const service = AuditService.configureFromEnv();
      expect(AuditService.configureFromEnv()).toBe(service);
      await expect(service.log({ actor: 'test', event: 'NOOP' })).resolves.toBeUndefined();
    } finally {
      if (previous !== undefined) process.env.AUDIT_ENABLED = previous;
    }
  });
});
