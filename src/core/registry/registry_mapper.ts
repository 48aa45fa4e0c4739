import { z } from 'zod';
import { Prospect } from '../../types';
import { ParseError } from '../../utils/errors';
import { parseRegistryId } from '../../utils/registry_id';
import { createProspect } from '../prospect/factory';

/**
 * Economic subject as returned by the ARES REST API (subset we use).
 */
export const AresSubjectSchema = z.object({
    ico: z.union([z.string(), z.number()]).optional(),
    obchodniJmeno: z.string().optional(),
    nazev: z.string().optional(),
    stav: z.string().optional(),
    stavSubjektu: z.string().optional(),
    datumVzniku: z.string().optional(),
});

export const AresSearchResponseSchema = z.object({
    pocetCelkem: z.number().optional(),
    ekonomickeSubjekty: z.array(z.unknown()).optional(),
});

export type AresSubject = z.infer<typeof AresSubjectSchema>;

export function parseRegistrationDate(raw: string | undefined): Date | undefined {
    if (!raw) return undefined;
    const date = new Date(raw);
    return Number.isNaN(date.getTime()) ? undefined : date;
}

/**
 * Maps a raw ARES subject to a registry-sourced Prospect.
 * Throws ParseError when the payload has no usable legal name.
 */
export function aresSubjectToProspect(raw: unknown): Prospect {
    const parsed = AresSubjectSchema.safeParse(raw);
    if (!parsed.success) {
        throw new ParseError('Unexpected ARES subject shape', { issues: parsed.error.issues.length });
    }

    const subject = parsed.data;
    const legalName = (subject.obchodniJmeno || subject.nazev || '').trim();
    if (!legalName) {
        throw new ParseError('ARES subject has no legal name', { ico: subject.ico });
    }

    return createProspect({
        name: legalName,
        legalName,
        registryId: parseRegistryId(subject.ico === undefined ? undefined : String(subject.ico)),
        status: subject.stav || subject.stavSubjektu,
        registrationDate: parseRegistrationDate(subject.datumVzniku),
        source: 'registry-structured',
    });
}
