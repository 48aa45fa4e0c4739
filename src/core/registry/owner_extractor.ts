/**
 * 👤 OWNER EXTRACTOR
 * Best-effort mining of the commercial register's HTML page.
 *
 * There is no schema here: each `div.detail` section is flattened to text,
 * checked for role markers, and the first run of capitalised words is taken
 * as the person's name. Layout changes on the register degrade silently to
 * an empty list.
 */

import * as cheerio from 'cheerio';
import { Owner } from '../../types';

export type OwnerExtractor = (html: string, registryId: string) => Owner[];

export interface RoleRule {
    role: string;
    markers: string[];
}

export const ROLE_RULES: RoleRule[] = [
    { role: 'statutární orgán', markers: ['statutární orgán', 'jednatel'] },
    { role: 'společník', markers: ['společník', 'vlastník'] },
];

const UPPER = 'A-ZÁČĎÉĚÍŇÓŘŠŤÚŮÝŽ';
const LOWER = 'a-záčďéěíňóřšťúůýž';

// Two or more capitalised words: "Jan Novák", "Marie Anna Dvořáková"
export const PERSON_NAME_PATTERN = new RegExp(`([${UPPER}][${LOWER}]+(?:\\s+[${UPPER}][${LOWER}]+)+)`);

export const DETAIL_SECTION_SELECTOR = 'div.detail';

export function extractPersonName(text: string): string | undefined {
    return text.match(PERSON_NAME_PATTERN)?.[1];
}

/**
 * One Owner per (section, matching role) pair. A section mentioning both a
 * director and a partner yields two owners with the same first name match.
 */
export const extractOwners: OwnerExtractor = (html, registryId) => {
    const owners: Owner[] = [];
    if (!html) return owners;

    const $ = cheerio.load(html);

    $(DETAIL_SECTION_SELECTOR).each((_, element) => {
        const text = $(element).text().replace(/\s+/g, ' ').trim();
        if (!text) return;

        const lower = text.toLowerCase();
        for (const rule of ROLE_RULES) {
            if (!rule.markers.some((marker) => lower.includes(marker))) continue;

            const name = extractPersonName(text);
            if (name) {
                owners.push({ name, role: rule.role, registryId });
            }
        }
    });

    return owners;
};
