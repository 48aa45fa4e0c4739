import { Prospect } from '../types';

/**
 * 👯 PROSPECT DEDUPLICATOR
 * Same business under two search phrases -> same normalized name + address.
 */
export class ProspectDeduplicator {
    private readonly seen = new Set<string>();

    static normalize(value: string | undefined): string {
        return (value ?? '')
            .toLowerCase()
            .normalize('NFD')
            .replace(/[\u0300-\u036f]/g, '') // strip accents
            .replace(/[^\p{L}\p{N}]+/gu, ' ')
            .trim();
    }

    static keyOf(prospect: Pick<Prospect, 'name' | 'address'>): string {
        return `${this.normalize(prospect.name)}|${this.normalize(prospect.address)}`;
    }

    isDuplicate(prospect: Pick<Prospect, 'name' | 'address'>): boolean {
        return this.seen.has(ProspectDeduplicator.keyOf(prospect));
    }

    register(prospect: Pick<Prospect, 'name' | 'address'>): void {
        this.seen.add(ProspectDeduplicator.keyOf(prospect));
    }

    /**
     * Keeps the first occurrence of each business, in order.
     */
    filter(prospects: Prospect[]): Prospect[] {
        const unique: Prospect[] = [];
        for (const prospect of prospects) {
            if (this.isDuplicate(prospect)) continue;
            this.register(prospect);
            unique.push(prospect);
        }
        return unique;
    }
}
