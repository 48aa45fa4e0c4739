import { describe, expect, it } from 'vitest';
import { extractOwners, extractPersonName } from '../../src/core/registry/owner_extractor';

const ICO = '12345678';

describe('extractOwners', () => {
    it('finds a director in a detail section', () => {
        const html = '<div class="detail">Jan Novák – statutární orgán</div>';

        expect(extractOwners(html, ICO)).toEqual([
            { name: 'Jan Novák', role: 'statutární orgán', registryId: ICO },
        ]);
    });

    it('collapses markup whitespace before matching', () => {
        const html = `
            <div class="detail">
                <span>Jednatel:</span>
                <span>Marie Anna Dvořáková</span>
            </div>`;

        expect(extractOwners(html, ICO)).toEqual([
            { name: 'Marie Anna Dvořáková', role: 'statutární orgán', registryId: ICO },
        ]);
    });

    it('emits one owner per matching role in a section', () => {
        const html = '<div class="detail">jednatel a společník: Petr Svoboda</div>';

        expect(extractOwners(html, ICO)).toEqual([
            { name: 'Petr Svoboda', role: 'statutární orgán', registryId: ICO },
            { name: 'Petr Svoboda', role: 'společník', registryId: ICO },
        ]);
    });

    it('ignores sections without role markers or without a name', () => {
        const html = `
            <div class="detail">Sídlo: Václavské náměstí 1, Praha</div>
            <div class="detail">statutární orgán: neuveden</div>`;

        expect(extractOwners(html, ICO)).toEqual([]);
    });

    it('only reads detail sections', () => {
        const html = '<p>Jednatel: Karel Dvořák</p><div class="summary">Jednatel: Karel Dvořák</div>';

        expect(extractOwners(html, ICO)).toEqual([]);
    });

    it('returns an empty list for an empty page', () => {
        expect(extractOwners('', ICO)).toEqual([]);
    });
});

describe('extractPersonName', () => {
    it('takes the first run of two or more capitalised words', () => {
        expect(extractPersonName('vlastník: Tomáš Čermák, Praha 2')).toBe('Tomáš Čermák');
    });

    it('returns undefined for a single capitalised word', () => {
        expect(extractPersonName('Jednatel: neuveden')).toBeUndefined();
    });
});
