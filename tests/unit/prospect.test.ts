import { describe, expect, it } from 'vitest';
import { createProspect, markContacted, sanitizeWebsite } from '../../src/core/prospect/factory';
import type { Owner } from '../../src/types';
import { ValidationError } from '../../src/utils/errors';
import { isValidRegistryId, normalizeRegistryId, parseRegistryId } from '../../src/utils/registry_id';

describe('registry id helpers', () => {
    it('strips separators', () => {
        expect(normalizeRegistryId('120 00 000')).toBe('12000000');
        expect(normalizeRegistryId('CZ-123.456/78')).toBe('12345678');
        expect(normalizeRegistryId(undefined)).toBe('');
    });

    it('accepts exactly 8 digits', () => {
        expect(isValidRegistryId('12345678')).toBe(true);
        expect(isValidRegistryId('1234567')).toBe(false);
        expect(isValidRegistryId('123456789')).toBe(false);
    });

    it('parses to the normalized id or undefined', () => {
        expect(parseRegistryId(' 123 45 678 ')).toBe('12345678');
        expect(parseRegistryId('1234')).toBeUndefined();
        expect(parseRegistryId(null)).toBeUndefined();
    });
});

describe('createProspect', () => {
    it('requires a non-blank name', () => {
        expect(() => createProspect({ name: '   ', source: 'search-engine' })).toThrow(ValidationError);
    });

    it('applies defaults', () => {
        const before = Date.now();
        const prospect = createProspect({ name: 'Salon Krása', source: 'search-engine' });

        expect(prospect.owners).toEqual([]);
        expect(prospect.reviewCount).toBe(0);
        expect(prospect.contacted).toBe(false);
        expect(prospect.discoveredAt.getTime()).toBeGreaterThanOrEqual(before);
    });

    it('trims text fields and drops blank ones', () => {
        const prospect = createProspect({
            name: '  Salon Krása ',
            address: ' Vodičkova 1 ',
            phone: '   ',
            source: 'search-engine',
        });

        expect(prospect.name).toBe('Salon Krása');
        expect(prospect.address).toBe('Vodičkova 1');
        expect(prospect.phone).toBeUndefined();
    });

    it('drops values that fail validation', () => {
        const prospect = createProspect({
            name: 'Salon Krása',
            website: 'ftp://salon-krasa.cz',
            rating: 7,
            reviewCount: -3,
            registryId: '1234',
            source: 'search-engine',
        });

        expect(prospect.website).toBeUndefined();
        expect(prospect.rating).toBeUndefined();
        expect(prospect.reviewCount).toBe(0);
        expect(prospect.registryId).toBeUndefined();
    });

    it('normalizes the registry id and stamps it on owners', () => {
        const director: Owner = { name: 'Jan Novák', role: 'statutární orgán' };
        const prospect = createProspect({
            name: 'Salon Krása',
            registryId: '123 45 678',
            owners: [director],
            source: 'registry-structured',
        });

        expect(prospect.registryId).toBe('12345678');
        expect(prospect.owners).toEqual([{ name: 'Jan Novák', role: 'statutární orgán', registryId: '12345678' }]);
        expect(director.registryId).toBeUndefined();
    });
});

describe('sanitizeWebsite', () => {
    it('keeps http(s) URLs only', () => {
        expect(sanitizeWebsite('https://salon-krasa.cz')).toBe('https://salon-krasa.cz');
        expect(sanitizeWebsite(' http://salon-krasa.cz/kontakt ')).toBe('http://salon-krasa.cz/kontakt');
        expect(sanitizeWebsite('salon-krasa.cz')).toBeUndefined();
        expect(sanitizeWebsite(undefined)).toBeUndefined();
    });
});

describe('markContacted', () => {
    it('records the contact time and note', () => {
        const prospect = createProspect({ name: 'Salon Krása', source: 'search-engine' });
        const at = new Date('2025-05-01T10:00:00Z');

        markContacted(prospect, at, ' called, call back Monday ');

        expect(prospect.contacted).toBe(true);
        expect(prospect.contactedAt).toBe(at);
        expect(prospect.notes).toBe('called, call back Monday');
    });
});
