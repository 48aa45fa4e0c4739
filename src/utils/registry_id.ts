/**
 * 🔢 Czech company identifier (IČO) helpers
 * The registries key everything on an 8-digit IČO; inputs arrive with
 * spaces or other separators ("120 00 000"), so digits are kept and the rest dropped.
 */

export const REGISTRY_ID_LENGTH = 8;

export function normalizeRegistryId(raw: string | undefined | null): string {
    return (raw ?? '').replace(/\D/g, '');
}

export function isValidRegistryId(normalized: string): boolean {
    return new RegExp(`^\\d{${REGISTRY_ID_LENGTH}}$`).test(normalized);
}

/**
 * Normalized IČO, or undefined when the input does not carry exactly 8 digits.
 */
export function parseRegistryId(raw: string | undefined | null): string | undefined {
    const normalized = normalizeRegistryId(raw);
    return isValidRegistryId(normalized) ? normalized : undefined;
}
