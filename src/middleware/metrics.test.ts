import { describe, it, expect } from 'vitest';
import { Request } from 'express';
import { routeLabel } from './metrics';

const request = (fields: Record<string, unknown>) => fields as unknown as Request;

describe('routeLabel', () => {
  it('uses the matched route pattern', () => {
    expect(routeLabel(request({ baseUrl: '/api', route: { path: '/simple/build-sync' } }))).toBe('/api/simple/build-sync');
  });

  it('groups unmatched requests together', () => {
    expect(routeLabel(request({ baseUrl: '', route: undefined }))).toBe('unmatched');
  });
});
