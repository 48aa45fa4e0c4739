/**
 * 📤 EXPORT MANAGER
 * Writes the final prospect list to CSV (flat, fixed columns) and JSON
 * (nested owners, absent fields omitted). Existing files are overwritten.
 */

import * as fs from 'fs';
import * as path from 'path';
import { createObjectCsvWriter } from 'csv-writer';
import { Owner, Prospect } from '../types';
import { Logger, defaultLogger } from '../utils/logger';

export const CSV_COLUMNS = [
    'name',
    'legalName',
    'address',
    'phone',
    'website',
    'registryId',
    'category',
    'rating',
    'reviewCount',
    'owners',
    'status',
    'mapsUrl',
    'discoveredAt',
] as const;

export type CsvColumn = typeof CSV_COLUMNS[number];
export type CsvRow = Record<CsvColumn, string | number>;

export function formatOwners(owners: Owner[]): string {
    return owners.map((owner) => `${owner.name} (${owner.role})`).join('; ');
}

export function toCsvRow(prospect: Prospect): CsvRow {
    return {
        name: prospect.name,
        legalName: prospect.legalName ?? '',
        address: prospect.address ?? '',
        phone: prospect.phone ?? '',
        website: prospect.website ?? '',
        registryId: prospect.registryId ?? '',
        category: prospect.category ?? '',
        rating: prospect.rating ?? '',
        reviewCount: prospect.reviewCount,
        owners: formatOwners(prospect.owners),
        status: prospect.status ?? '',
        mapsUrl: prospect.mapsUrl ?? '',
        discoveredAt: prospect.discoveredAt.toISOString(),
    };
}

export type JsonValue = string | number | boolean | JsonValue[] | { [key: string]: JsonValue };

/**
 * Plain JSON object for one prospect: Dates as ISO strings, undefined dropped.
 */
export function toJsonRecord(prospect: Prospect): Record<string, JsonValue> {
    const record: Record<string, JsonValue> = {};
    const entries: Array<[string, unknown]> = Object.entries(prospect);

    for (const [key, value] of entries) {
        if (value === undefined || value === null) continue;
        if (value instanceof Date) {
            record[key] = value.toISOString();
        } else if (key === 'owners') {
            record[key] = prospect.owners.map((owner) => {
                const out: Record<string, JsonValue> = { name: owner.name, role: owner.role };
                if (owner.registryId) out.registryId = owner.registryId;
                return out;
            });
        } else if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
            record[key] = value;
        }
    }

    return record;
}

export class ExportManager {
    constructor(private readonly logger: Logger = defaultLogger) { }

    async exportCsv(prospects: Prospect[], filePath: string): Promise<string> {
        await fs.promises.mkdir(path.dirname(filePath), { recursive: true });

        const writer = createObjectCsvWriter({
            path: filePath,
            header: CSV_COLUMNS.map((id) => ({ id, title: id })),
            encoding: 'utf8',
            append: false,
        });

        await writer.writeRecords(prospects.map(toCsvRow));
        this.logger.info(`📤 Saved ${prospects.length} prospects to ${filePath}`);
        return filePath;
    }

    async exportJson(prospects: Prospect[], filePath: string): Promise<string> {
        await fs.promises.mkdir(path.dirname(filePath), { recursive: true });

        const payload = JSON.stringify(prospects.map(toJsonRecord), null, 2);
        await fs.promises.writeFile(filePath, payload, 'utf8');

        this.logger.info(`📤 Saved ${prospects.length} prospects to ${filePath}`);
        return filePath;
    }

    /**
     * CSV + JSON side by side: <dir>/<basename>.csv and <dir>/<basename>.json
     */
    async exportAll(prospects: Prospect[], directory: string, basename: string): Promise<{ csv: string; json: string }> {
        const csv = await this.exportCsv(prospects, path.join(directory, `${basename}.csv`));
        const json = await this.exportJson(prospects, path.join(directory, `${basename}.json`));
        return { csv, json };
    }
}

/**
 * prospects_20250101_120000 style stamp, local time.
 */
export function timestampedBasename(prefix: string, now: Date = new Date()): string {
    const pad = (n: number) => String(n).padStart(2, '0');
    const date = `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}`;
    const time = `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
    return `${prefix}_${date}_${time}`;
}
