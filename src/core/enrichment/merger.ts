/**
 * 🔀 ENRICHMENT MERGER
 * Registry data outranks search data, but only when it actually carries a
 * value: an absent registry field never erases what the prospect already has.
 */

import { Owner, Prospect } from '../../types';

export type RegistryRecord = Pick<Prospect, 'registryId' | 'legalName' | 'status' | 'registrationDate'>;

function hasValue(value: unknown): boolean {
    return value !== undefined && value !== null && value !== '';
}

export class EnrichmentMerger {
    /**
     * Copies registry fields onto the prospect in place.
     * Returns the names of the fields that changed.
     */
    static mergeRegistryRecord(prospect: Prospect, record: RegistryRecord): string[] {
        const changed: string[] = [];

        if (hasValue(record.registryId) && record.registryId !== prospect.registryId) {
            prospect.registryId = record.registryId;
            changed.push('registryId');
        }
        if (hasValue(record.legalName) && record.legalName !== prospect.legalName) {
            prospect.legalName = record.legalName;
            changed.push('legalName');
        }
        if (hasValue(record.status) && record.status !== prospect.status) {
            prospect.status = record.status;
            changed.push('status');
        }
        if (record.registrationDate && record.registrationDate.getTime() !== prospect.registrationDate?.getTime()) {
            prospect.registrationDate = record.registrationDate;
            changed.push('registrationDate');
        }

        return changed;
    }

    /**
     * Replaces the owner list wholesale, unless the extraction came back empty.
     */
    static mergeOwners(prospect: Prospect, owners: Owner[]): boolean {
        if (owners.length === 0) return false;
        prospect.owners = [...owners];
        return true;
    }
}
