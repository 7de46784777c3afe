import { describe, it, expect } from 'vitest';
import { createChartLoadRequest, assertChartId } from '../../src/domain/chart-load-request.js';
import { createSteppingClock } from '../../src/ports/clockPort.js';
import { ValidationError } from '../../src/errors.js';

describe('createChartLoadRequest', () => {
  it('should stamp the request with the clock time and freeze it', () => {
    const request = createChartLoadRequest(
      { chartId: 'US5WA50M', archivePath: '/charts/US5WA50M.zip' },
      createSteppingClock(1000)
    );

    expect(request).toEqual({
      chartId: 'US5WA50M',
      archivePath: '/charts/US5WA50M.zip',
      enqueuedAt: 1000,
    });
    expect(Object.isFrozen(request)).toBe(true);
  });

  it('should reject chart ids containing path separators', () => {
    expect(() =>
      createChartLoadRequest({ chartId: '../US5WA50M', archivePath: '/charts/a.zip' })
    ).toThrow(ValidationError);
  });

  it('should reject an empty archive path', () => {
    expect(() => createChartLoadRequest({ chartId: 'US5WA50M', archivePath: '' })).toThrow(
      ValidationError
    );
  });
});

describe('assertChartId', () => {
  it('should accept cell names', () => {
    expect(() => assertChartId('US5WA50M')).not.toThrow();
    expect(() => assertChartId('gb_4000-1')).not.toThrow();
  });

  it('should reject dotted names', () => {
    expect(() => assertChartId('US5WA50M.000')).toThrow(ValidationError);
  });
});
