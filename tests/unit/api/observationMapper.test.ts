import { describe, expect, it } from 'vitest';
import { mapObservationToFhir, mapObservationsToBundle } from '../../../src/api/observationMapper.js';
import { observationOf } from '../fixtures.js';

describe('observationMapper', () => {
  it('maps an observation to a FHIR Observation resource', () => {
    expect(mapObservationToFhir(observationOf())).toEqual({
      resourceType: 'Observation',
      id: 'obs-1',
      status: 'final',
      code: {
        coding: [{ system: 'http://loinc.org', code: 'sound', display: 'Sound Level' }],
        text: 'Sound Level',
      },
      subject: { reference: 'Patient/p1' },
      device: { display: 'dev-1' },
      effectiveDateTime: '2024-05-01T10:00:00.000Z',
      issued: '2024-05-01T10:00:01.000Z',
      valueQuantity: { value: 245, unit: 'au' },
    });
  });

  it('wraps observations in a collection bundle', () => {
    const bundle = mapObservationsToBundle([observationOf({ id: 'a' }), observationOf({ id: 'b' })]);

    expect(bundle.resourceType).toBe('Bundle');
    expect(bundle.type).toBe('collection');
    expect(bundle.total).toBe(2);
    expect(bundle.entry.map((e) => e.fullUrl)).toEqual(['Observation/a', 'Observation/b']);
  });

  it('produces an empty bundle for no results', () => {
    expect(mapObservationsToBundle([])).toEqual({ resourceType: 'Bundle', type: 'collection', total: 0, entry: [] });
  });
});
