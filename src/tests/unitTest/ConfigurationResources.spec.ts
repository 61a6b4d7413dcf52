import { clientWith, fakeFetch } from '../helpers/fakeApi';

const root = 'https://test-host/appsec/v1/configs';

describe('Configuration clone', () => {
  it('getConfigurationClone décode les statuts staging/production', async () => {
    const version = {
      configId: 1,
      configName: 'site',
      version: 2,
      versionNotes: 'initial',
      createDate: '2024-01-02T03:04:05Z',
      createdBy: 'someone',
      basedOn: 1,
      production: { status: 'Active', time: '2024-01-03T00:00:00Z' },
      staging: { status: 'Inactive' },
    };
    const { fetch, calls } = fakeFetch({ status: 200, json: version });
    const client = await clientWith(fetch);

    const res = await client.configurationClone.getConfigurationClone({ configId: 1, version: 2 });

    expect(calls[0].url).toBe(`${root}/1/versions/2`);
    expect(res).toEqual(version);
  });

  it('createConfigurationClone ne sérialise que les champs du corps', async () => {
    const { fetch, calls } = fakeFetch({ status: 201, json: { configId: 99, version: 1, name: 'copy' } });
    const client = await clientWith(fetch);

    const res = await client.configurationClone.createConfigurationClone({
      name: 'copy',
      contractId: 'C-1',
      groupId: 10,
      hostnames: ['www.example.com'],
      createFrom: { configId: 5, version: 3 },
    });

    expect(calls[0].method).toBe('POST');
    expect(calls[0].url).toBe(root);
    expect(calls[0].body).toBe('{"name":"copy","contractId":"C-1","groupId":10,"hostnames":["www.example.com"],"createFrom":{"configId":5,"version":3}}');
    expect(res).toEqual({ configId: 99, version: 1, name: 'copy' });
  });
});

describe('Version notes', () => {
  it('lecture puis mise à jour', async () => {
    const { fetch, calls } = fakeFetch({ status: 200, json: { notes: 'old' } }, { status: 200, json: { notes: 'release 3' } });
    const client = await clientWith(fetch);

    const before = await client.versionNotes.getVersionNotes({ configId: 1, version: 2 });
    const after = await client.versionNotes.updateVersionNotes({ configId: 1, version: 2, notes: 'release 3' });

    expect(before.notes).toBe('old');
    expect(after.notes).toBe('release 3');
    expect(calls[1].method).toBe('PUT');
    expect(calls[1].url).toBe(`${root}/1/versions/2/version-notes`);
    expect(calls[1].body).toBe('{"notes":"release 3"}');
  });
});

describe('Reputation analysis', () => {
  const url = `${root}/1/versions/2/security-policies/pol1/reputation-analysis`;

  it('update envoie les deux drapeaux', async () => {
    const { fetch, calls } = fakeFetch({ status: 200, json: { forwardToHTTPHeader: true, forwardSharedIPToHTTPHeaderAndSIEM: false } });
    const client = await clientWith(fetch);

    const res = await client.reputationAnalysis.updateReputationAnalysis({ configId: 1, version: 2, policyId: 'pol1', forwardToHTTPHeader: true });

    expect(calls[0].url).toBe(url);
    expect(calls[0].body).toBe('{"forwardToHTTPHeader":true,"forwardSharedIPToHTTPHeaderAndSIEM":false}');
    expect(res.forwardToHTTPHeader).toBe(true);
  });

  it('get puis remove : PUT des drapeaux à false par défaut', async () => {
    const reset = { forwardToHTTPHeader: false, forwardSharedIPToHTTPHeaderAndSIEM: false };
    const { fetch, calls } = fakeFetch({ status: 200, json: { forwardToHTTPHeader: true } }, { status: 201, json: reset });
    const client = await clientWith(fetch);

    const current = await client.reputationAnalysis.getReputationAnalysis({ configId: 1, version: 2, policyId: 'pol1' });
    const removed = await client.reputationAnalysis.removeReputationAnalysis({ configId: 1, version: 2, policyId: 'pol1' });

    expect(current).toEqual({ forwardToHTTPHeader: true });
    expect(removed).toEqual(reset);
    expect(calls.map((c) => c.method)).toEqual(['GET', 'PUT']);
    expect(calls[1].url).toBe(url);
    expect(calls[1].headers.get('content-type')).toBe('application/json');
    expect(calls[1].body).toBe('{"forwardToHTTPHeader":false,"forwardSharedIPToHTTPHeaderAndSIEM":false}');
  });

  it('remove transmet les drapeaux fournis', async () => {
    const { fetch, calls } = fakeFetch({ status: 200, json: {} });
    const client = await clientWith(fetch);

    await client.reputationAnalysis.removeReputationAnalysis({ configId: 1, version: 2, policyId: 'pol1', forwardSharedIPToHTTPHeaderAndSIEM: true });

    expect(calls[0].body).toBe('{"forwardToHTTPHeader":false,"forwardSharedIPToHTTPHeaderAndSIEM":true}');
  });
});

describe('Hostname coverage', () => {
  const url = `${root}/1/versions/2/hostname-coverage/overlapping`;
  const overlap = {
    overLappingList: [{ configId: 7, configName: 'other', configVersion: 3, contractId: 'C-1', contractName: 'Contract', versionTags: ['STAGING'] }],
  };

  it('ajoute hostname seulement s’il est renseigné', async () => {
    const { fetch, calls } = fakeFetch({ status: 200, json: overlap });
    const client = await clientWith(fetch);

    const res = await client.hostnameCoverage.getApiHostnameCoverageOverlapping({ configId: 1, version: 2, hostname: 'www.example.com' });
    await client.hostnameCoverage.getApiHostnameCoverageOverlapping({ configId: 1, version: 2, hostname: '' });
    await client.hostnameCoverage.getApiHostnameCoverageOverlapping({ configId: 1, version: 2 });

    expect(calls.map((c) => c.url)).toEqual([`${url}?hostname=www.example.com`, url, url]);
    expect(res).toEqual(overlap);
  });
});
