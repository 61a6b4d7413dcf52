import { clientWith, fakeFetch } from '../helpers/fakeApi';

const base = 'https://test-host/appsec/v1/configs/10/versions/3/reputation-profiles';

const listPayload = {
  reputationProfiles: [
    {
      id: 1,
      name: 'Web scrapers',
      context: 'WEBSCRP',
      threshold: 5,
      sharedIpHandling: 'NON_SHARED',
      condition: {
        positiveMatch: true,
        atomicConditions: [
          { className: 'AsNumberCondition', name: 'ASN-1', value: ['64500'] },
          { className: 'RequestHeaderCondition', name: ['x-a', 'x-b'], positiveMatch: true },
          { className: 'IpAddressCondition', checkIps: 'connecting', host: ['www.example.com'] },
        ],
      },
    },
    { id: 2, name: 'DoS attackers', threshold: 9 },
  ],
};

describe('ReputationProfileManager', () => {
  it('normalise le nom des conditions atomiques en liste', async () => {
    const { fetch, calls } = fakeFetch({ status: 200, json: listPayload });
    const client = await clientWith(fetch);

    const res = await client.reputationProfiles.getReputationProfiles({ configId: 10, configVersion: 3 });

    expect(calls[0].url).toBe(base);
    const names = res.reputationProfiles[0].condition?.atomicConditions?.map((c) => c.name);
    expect(names).toEqual([['ASN-1'], ['x-a', 'x-b'], []]);
    expect(res.reputationProfiles[0].condition?.atomicConditions?.[2].checkIps).toBe('connecting');
  });

  it('filtre sur reputationProfileId', async () => {
    const { fetch } = fakeFetch({ status: 200, json: listPayload });
    const client = await clientWith(fetch);

    const res = await client.reputationProfiles.getReputationProfiles({ configId: 10, configVersion: 3, reputationProfileId: 2 });

    expect(res.reputationProfiles).toEqual([{ id: 2, name: 'DoS attackers', threshold: 9 }]);
  });

  it('getReputationProfile cible le profil', async () => {
    const { fetch, calls } = fakeFetch({ status: 200, json: { id: 2, name: 'DoS attackers' } });
    const client = await clientWith(fetch);

    const res = await client.reputationProfiles.getReputationProfile({ configId: 10, configVersion: 3, reputationProfileId: 2 });

    expect(calls[0].url).toBe(`${base}/2`);
    expect(res.name).toBe('DoS attackers');
  });

  it('getReputationProfile accepte une description à null', async () => {
    const { fetch } = fakeFetch({ status: 200, text: '{"id":5,"name":"p","description":null}' });
    const client = await clientWith(fetch);

    const res = await client.reputationProfiles.getReputationProfile({ configId: 10, configVersion: 3, reputationProfileId: 5 });

    expect(res).toEqual({ id: 5, name: 'p' });
  });

  it('create et update envoient le payload brut', async () => {
    const payload = '{"name":"Scanners","context":"SCANTL","threshold":4}';
    const { fetch, calls } = fakeFetch({ status: 200, json: { id: 4, name: 'Scanners', threshold: 4 } });
    const client = await clientWith(fetch);

    await client.reputationProfiles.createReputationProfile({ configId: 10, configVersion: 3, jsonPayload: payload });
    const updated = await client.reputationProfiles.updateReputationProfile({ configId: 10, configVersion: 3, reputationProfileId: 4, jsonPayload: payload });

    expect(calls.map((c) => [c.method, c.url, c.body])).toEqual([
      ['POST', base, payload],
      ['PUT', `${base}/4`, payload],
    ]);
    expect(updated.threshold).toBe(4);
  });

  it('removeReputationProfile envoie un DELETE sans corps', async () => {
    const { fetch, calls } = fakeFetch({ status: 200, json: { id: 4 } });
    const client = await clientWith(fetch);

    const res = await client.reputationProfiles.removeReputationProfile({ configId: 10, configVersion: 3, reputationProfileId: 4 });

    expect(calls[0].method).toBe('DELETE');
    expect(calls[0].body).toBeUndefined();
    expect(res).toEqual({ id: 4 });
  });
});
