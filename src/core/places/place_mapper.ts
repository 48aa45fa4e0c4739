import { z } from 'zod';
import { PLACE_CATEGORIES, PlaceCategory, Prospect } from '../../types';
import { createProspect } from '../prospect/factory';

const MAPS_PLACE_URL = 'https://www.google.com/maps/place/?q=place_id:';

/**
 * Raw place record as returned by text search / details. Everything is
 * optional: records are mapped opportunistically.
 */
export const PlaceRecordSchema = z.object({
    place_id: z.string().optional(),
    name: z.string().optional(),
    formatted_address: z.string().optional(),
    formatted_phone_number: z.string().optional(),
    international_phone_number: z.string().optional(),
    website: z.string().optional(),
    rating: z.number().optional(),
    user_ratings_total: z.number().optional(),
    types: z.array(z.string()).optional(),
});

export type PlaceRecord = z.infer<typeof PlaceRecordSchema>;

export const TextSearchResponseSchema = z.object({
    status: z.string(),
    results: z.array(z.unknown()).default([]),
    next_page_token: z.string().optional(),
    error_message: z.string().optional(),
});

export const DetailsResponseSchema = z.object({
    status: z.string(),
    result: z.unknown().optional(),
    error_message: z.string().optional(),
});

export function isPlaceCategory(value: string): value is PlaceCategory {
    return (PLACE_CATEGORIES as readonly string[]).includes(value);
}

/**
 * First type tag that is on the category whitelist.
 */
export function pickCategory(types: string[] | undefined): PlaceCategory | undefined {
    return (types ?? []).find(isPlaceCategory);
}

export function buildMapsUrl(placeId: string | undefined): string | undefined {
    return placeId ? `${MAPS_PLACE_URL}${encodeURIComponent(placeId)}` : undefined;
}

/**
 * Converts one place record into a Prospect. Returns null for records
 * without a name (name is the one field that cannot be waived).
 */
export function placeToProspect(place: PlaceRecord): Prospect | null {
    if (!place.name?.trim()) return null;

    return createProspect({
        name: place.name,
        address: place.formatted_address,
        phone: place.formatted_phone_number || place.international_phone_number,
        website: place.website,
        rating: place.rating,
        reviewCount: place.user_ratings_total ?? 0,
        category: pickCategory(place.types),
        mapsUrl: buildMapsUrl(place.place_id),
        source: 'search-engine',
    });
}
