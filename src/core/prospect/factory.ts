import { z } from 'zod';
import { Owner, Prospect, ProspectInit } from '../../types';
import { ValidationError } from '../../utils/errors';
import { parseRegistryId } from '../../utils/registry_id';

const WebsiteSchema = z.string().trim().url().refine(
    (value) => /^https?:\/\//i.test(value),
    'Website must be an http(s) URL'
);
const RatingSchema = z.number().finite().min(0).max(5);
const ReviewCountSchema = z.number().int().min(0);

function clean(value: string | undefined): string | undefined {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
}

export function sanitizeWebsite(value: string | undefined): string | undefined {
    const parsed = WebsiteSchema.safeParse(value);
    return parsed.success ? parsed.data : undefined;
}

/**
 * Builds a Prospect from loosely-typed source data.
 * Throws ValidationError when the name is blank; every other field is
 * dropped to absent when it does not pass validation.
 */
export function createProspect(init: ProspectInit): Prospect {
    const name = clean(init.name);
    if (!name) {
        throw new ValidationError('Prospect name is required', { source: init.source });
    }

    const registryId = parseRegistryId(init.registryId);
    const rating = RatingSchema.safeParse(init.rating);
    const reviewCount = ReviewCountSchema.safeParse(init.reviewCount);

    const prospect: Prospect = {
        name,
        legalName: clean(init.legalName),
        address: clean(init.address),
        phone: clean(init.phone),
        website: sanitizeWebsite(init.website),
        mapsUrl: clean(init.mapsUrl),
        category: init.category,
        rating: rating.success ? rating.data : undefined,
        reviewCount: reviewCount.success ? reviewCount.data : 0,
        registryId,
        registrationDate: init.registrationDate,
        status: clean(init.status),
        owners: (init.owners ?? []).map((owner) => withRegistryId(owner, registryId)),
        source: init.source,
        discoveredAt: init.discoveredAt ?? new Date(),
        contacted: init.contacted ?? false,
        contactedAt: init.contactedAt,
        notes: clean(init.notes),
    };

    return prospect;
}

function withRegistryId(owner: Owner, registryId: string | undefined): Owner {
    return owner.registryId || !registryId ? owner : { ...owner, registryId };
}

/**
 * Flags a prospect as contacted (outreach bookkeeping).
 */
export function markContacted(prospect: Prospect, at: Date = new Date(), notes?: string): Prospect {
    prospect.contacted = true;
    prospect.contactedAt = at;
    const note = clean(notes);
    if (note) prospect.notes = note;
    return prospect;
}
