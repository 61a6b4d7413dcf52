import { appendQuery, buildPath } from '../../core/utils/UrlBuilder';
import { ValidationError } from '../../core/utils/errors';

describe('UrlBuilder', () => {
  it('substitue et encode les placeholders', () => {
    const path = buildPath('Op', '/configs/{configId}/versions/{version}/custom-deny/{id}', {
      configId: 43253,
      version: 7,
      id: 'deny_custom/1',
    });
    expect(path).toBe('/configs/43253/versions/7/custom-deny/deny_custom%2F1');
  });

  it('lève une ValidationError listant les placeholders manquants', () => {
    let caught: unknown;
    try {
      buildPath('GetAttackGroup', '/p/{policyId}/g/{group}', { policyId: '', group: undefined });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ValidationError);
    if (caught instanceof ValidationError) {
      expect(caught.fields).toEqual(['policyId', 'group']);
      expect(caught.message).toBe('GetAttackGroup: invalid request: policyId is required; group is required');
    }
  });

  it('ajoute les drapeaux fixes et ignore les paramètres optionnels vides', () => {
    expect(appendQuery('/a', { includeConditionException: 'true' })).toBe('/a?includeConditionException=true');
    expect(appendQuery('/a', {}, { hostname: '' })).toBe('/a');
    expect(appendQuery('/a', {}, { hostname: undefined })).toBe('/a');
    expect(appendQuery('/a', {}, { hostname: 'www.example.com' })).toBe('/a?hostname=www.example.com');
    expect(appendQuery('/a')).toBe('/a');
  });
});
