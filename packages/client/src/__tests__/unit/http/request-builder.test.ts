/**
 * Request Builder Tests
 */

import { describe, it, expect } from 'vitest';
import { InvalidRequestError } from '../../../core/errors.js';
import { RequestBuilder, buildUrl, dayCode, densityPath } from '../../../http/request-builder.js';
import { Envelope } from '../../../model/envelope.js';
import { historyQuery, nearbyByGeohash, nearbyByLatLon, resolveQuery } from '../../../query/query.js';

const BASE = 'https://api.test/0.1';

describe('buildUrl', () => {
  it('should form-encode every non-null parameter once', () => {
    expect(buildUrl('https://api.test/x', { q: 'one two', skip: null, gone: undefined, n: 3 })).toBe(
      'https://api.test/x?q=one+two&n=3'
    );
  });

  it('should escape separators inside values', () => {
    expect(buildUrl('https://api.test/x', { q: 'a&b=c' })).toBe('https://api.test/x?q=a%26b%3Dc');
  });

  it('should leave the url alone when nothing is set', () => {
    expect(buildUrl('https://api.test/x', { a: null })).toBe('https://api.test/x');
    expect(buildUrl('https://api.test/x')).toBe('https://api.test/x');
  });
});

describe('dayCode', () => {
  it('should map Sunday-based day numbers to three-letter codes', () => {
    expect([0, 1, 2, 3, 4, 5, 6].map(dayCode)).toEqual(['sun', 'mon', 'tue', 'wed', 'thu', 'fri', 'sat']);
  });

  it('should reject days outside 0-6', () => {
    expect(() => dayCode(7)).toThrow(InvalidRequestError);
    expect(() => dayCode(-1)).toThrow(InvalidRequestError);
    expect(() => dayCode(1.5)).toThrow(InvalidRequestError);
  });
});

describe('densityPath', () => {
  it('should include the hour segment for hours 0 through 23', () => {
    expect(densityPath(1, 14, 37.7749, -122.4194)).toBe('/density/mon/14/37.774900,-122.419400.json');
    expect(densityPath(1, 0, 37.7749, -122.4194)).toBe('/density/mon/0/37.774900,-122.419400.json');
    expect(densityPath(1, 23, 37.7749, -122.4194)).toBe('/density/mon/23/37.774900,-122.419400.json');
  });

  it('should ask for the whole day for any other hour', () => {
    expect(densityPath(0, 24, 37.7749, -122.4194)).toBe('/density/sun/37.774900,-122.419400.json');
    expect(densityPath(6, -1, 37.7749, -122.4194)).toBe('/density/sat/37.774900,-122.419400.json');
  });
});

describe('RequestBuilder', () => {
  const builder = new RequestBuilder(BASE);

  describe('records', () => {
    it('should encode each id and join them with commas', () => {
      const request = builder.retrieve('com.example.transit', ['bus 1', 'tram/7']);

      expect(request.method).toBe('GET');
      expect(request.uri).toBe(`${BASE}/records/com.example.transit/bus%201,tram%2F7.json`);
    });

    it('should reject a retrieve without ids', () => {
      expect(() => builder.retrieve('com.example.transit', [])).toThrow(InvalidRequestError);
    });

    it('should POST the document as JSON', () => {
      const request = builder.update('com.example.transit', { type: 'Point', coordinates: [1, 2] });

      expect(request).toEqual({
        operation: 'update',
        method: 'POST',
        uri: `${BASE}/records/com.example.transit.json`,
        body: '{"type":"Point","coordinates":[1,2]}',
        contentType: 'application/json',
      });
    });

    it('should DELETE one record by id', () => {
      const request = builder.delete('com.example.transit', 'bus-1');

      expect(request.method).toBe('DELETE');
      expect(request.uri).toBe(`${BASE}/records/com.example.transit/bus-1.json`);
      expect(request.body).toBeUndefined();
    });

    it('should reject an empty layer', () => {
      expect(() => builder.delete('', 'bus-1')).toThrow(InvalidRequestError);
    });
  });

  describe('queries', () => {
    it('should build a geohash nearby request with comma-joined types', () => {
      const query = nearbyByGeohash('9q8yy', 'com.example.transit', { limit: 10, types: ['bus', 'tram'] });

      expect(builder.query('nearby', resolveQuery(query)).uri).toBe(
        `${BASE}/records/com.example.transit/nearby/9q8yy.json?limit=10&types=bus%2Ctram`
      );
    });

    it('should build a point nearby request with a radius', () => {
      const query = nearbyByLatLon(37.5, -122.25, 2, 'com.example.transit');

      expect(builder.query('nearby', resolveQuery(query)).uri).toBe(
        `${BASE}/records/com.example.transit/nearby/37.500000,-122.250000.json?radius=2`
      );
    });

    it('should build a history request carrying the cursor', () => {
      const query = historyQuery('bus-1', 'com.example.transit', { limit: 5, cursor: 'abc' });

      expect(builder.query('history', resolveQuery(query)).uri).toBe(
        `${BASE}/records/com.example.transit/bus-1/history.json?limit=5&cursor=abc`
      );
    });
  });

  describe('coordinates', () => {
    it('should render coordinates with six fixed decimals', () => {
      expect(builder.reverseGeocode(37.7749, -122.4194).uri).toBe(
        `${BASE}/nearby/address/37.774900,-122.419400.json`
      );
    });

    it('should never switch to exponent notation', () => {
      expect(builder.contains(0.0000001, -0.0000001).uri).toBe(`${BASE}/contains/0.000000,-0.000000.json`);
    });

    it('should reject out-of-range coordinates before building', () => {
      expect(() => builder.contains(91, 0)).toThrow(InvalidRequestError);
      expect(() => builder.contains(0, 181)).toThrow(InvalidRequestError);
      expect(() => builder.reverseGeocode(Number.NaN, 0)).toThrow(InvalidRequestError);
    });

    it('should build the density request with the hour segment', () => {
      expect(builder.density(5, 8, 40.7128, -74.006).uri).toBe(`${BASE}/density/fri/8/40.712800,-74.006000.json`);
    });
  });

  describe('boundaries', () => {
    it('should encode the feature id', () => {
      expect(builder.boundary('CA:San Francisco').uri).toBe(`${BASE}/boundary/CA%3ASan%20Francisco.json`);
    });

    const envelope = new Envelope({ west: -122.5, south: 37.7, east: -122.3, north: 37.8 });

    it('should send limit and type when given', () => {
      expect(builder.overlaps(envelope, 10, 'City').uri).toBe(
        `${BASE}/overlaps/37.700000,-122.500000,37.800000,-122.300000.json?limit=10&type=City`
      );
    });

    it('should leave out a limit of zero and a missing type', () => {
      expect(builder.overlaps(envelope, 0).uri).toBe(
        `${BASE}/overlaps/37.700000,-122.500000,37.800000,-122.300000.json`
      );
      expect(builder.overlaps(envelope, 0, 'County').uri).toBe(
        `${BASE}/overlaps/37.700000,-122.500000,37.800000,-122.300000.json?type=County`
      );
    });
  });
});
