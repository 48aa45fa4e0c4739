export const PLACE_CATEGORIES = [
    'beauty_salon',
    'hair_care',
    'spa',
    'restaurant',
    'cafe',
    'store',
    'gym',
    'travel_agency',
] as const;

export type PlaceCategory = typeof PLACE_CATEGORIES[number];

export type ProspectSource = 'search-engine' | 'registry-structured' | 'registry-html';

export interface Owner {
    name: string;
    role: string; // e.g. "statutární orgán", "společník"
    registryId?: string;
}

/**
 * A discovered business candidate. Created by the search layer, filled in
 * at most once by registry enrichment, terminal after export.
 */
export interface Prospect {
    name: string;
    legalName?: string;

    address?: string;
    phone?: string;
    website?: string;
    mapsUrl?: string;

    category?: PlaceCategory;
    rating?: number;
    reviewCount: number;

    registryId?: string; // IČO, 8 digits
    registrationDate?: Date;
    status?: string;

    owners: Owner[];

    source: ProspectSource;
    readonly discoveredAt: Date;
    contacted: boolean;
    contactedAt?: Date;
    notes?: string;
}

export type ProspectInit = Omit<Prospect, 'discoveredAt' | 'owners' | 'reviewCount' | 'contacted'> & {
    owners?: Owner[];
    reviewCount?: number;
    contacted?: boolean;
    discoveredAt?: Date;
};
