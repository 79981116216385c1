import type { ScanExportDocument, ScanRecord } from '@/types';

import { parseScanDocument, serializeScanDocument } from './scanDocument';

const LIBRARY_KEY = 'roomscan:library';
const DOCUMENT_KEY_PREFIX = 'roomscan:document:';
const CURRENT_VERSION = 1;

export const SCAN_LIBRARY_STORAGE_KEY = LIBRARY_KEY;

interface StoredPayload {
    version: number;
    scans: ScanRecord[];
}

const isNonEmptyString = (value: unknown): value is string =>
    typeof value === 'string' && value.trim().length > 0;

const isIsoTimestamp = (value: unknown): value is string =>
    typeof value === 'string' && !Number.isNaN(Date.parse(value));

const isRecord = (value: unknown): value is Record<string, unknown> =>
    typeof value === 'object' && value !== null && !Array.isArray(value);

export const scanDocumentKey = (fileName: string): string => `${DOCUMENT_KEY_PREFIX}${fileName}`;

const parseScanRecord = (input: unknown): ScanRecord | null => {
    if (!isRecord(input)) {
        return null;
    }
    const { id, name, savedAt, fileName } = input;
    if (!isNonEmptyString(id) || !isNonEmptyString(name) || !isNonEmptyString(fileName)) {
        return null;
    }
    if (!isIsoTimestamp(savedAt)) {
        return null;
    }
    return { id, name, savedAt, fileName };
};

/** Saved scans, newest first. */
export const loadScanLibrary = (storage: Storage | undefined): ScanRecord[] => {
    if (!storage) {
        return [];
    }
    const raw = storage.getItem(LIBRARY_KEY);
    if (!raw) {
        return [];
    }
    try {
        const parsed: unknown = JSON.parse(raw);
        if (!isRecord(parsed) || parsed.version !== CURRENT_VERSION) {
            return [];
        }
        if (!Array.isArray(parsed.scans)) {
            return [];
        }
        const scans: ScanRecord[] = [];
        for (const candidate of parsed.scans) {
            const record = parseScanRecord(candidate);
            if (record) {
                scans.push(record);
            }
        }
        return scans.sort((a, b) => Date.parse(b.savedAt) - Date.parse(a.savedAt));
    } catch (error) {
        console.warn('Failed to parse scan library storage', error);
        return [];
    }
};

const writeScanLibrary = (storage: Storage, scans: ScanRecord[]): boolean => {
    const payload: StoredPayload = { version: CURRENT_VERSION, scans };
    try {
        storage.setItem(LIBRARY_KEY, JSON.stringify(payload));
        return true;
    } catch (error) {
        console.warn('Failed to persist scan library storage', error);
        return false;
    }
};

const sanitizeFileNamePart = (name: string): string =>
    name
        .trim()
        .toLowerCase()
        .replace(/[^a-z0-9]+/g, '-')
        .replace(/^-+|-+$/g, '') || 'scan';

export interface SaveScanParams {
    storage: Storage | undefined;
    name: string;
    document: ScanExportDocument;
    now?: Date;
    createId?: () => string;
}

/**
 * Store a document and add it to the library. Returns the new record, or null when
 * there is no storage or writing fails.
 */
export const saveScan = ({
    storage,
    name,
    document,
    now = new Date(),
    createId = () => crypto.randomUUID(),
}: SaveScanParams): ScanRecord | null => {
    if (!storage) {
        return null;
    }
    const id = createId();
    const trimmedName = name.trim() || 'Untitled scan';
    const fileName = `${sanitizeFileNamePart(trimmedName)}-${id}.json`;
    const record: ScanRecord = {
        id,
        name: trimmedName,
        savedAt: now.toISOString(),
        fileName,
    };

    try {
        storage.setItem(scanDocumentKey(fileName), serializeScanDocument(document));
    } catch (error) {
        console.warn('Failed to persist scan document', error);
        return null;
    }

    const scans = loadScanLibrary(storage).filter((entry) => entry.id !== id);
    if (!writeScanLibrary(storage, [record, ...scans])) {
        storage.removeItem(scanDocumentKey(fileName));
        return null;
    }
    return record;
};

/** Remove a scan and its document. Returns false when the id is unknown. */
export const deleteScan = (storage: Storage | undefined, id: string): boolean => {
    if (!storage) {
        return false;
    }
    const scans = loadScanLibrary(storage);
    const target = scans.find((entry) => entry.id === id);
    if (!target) {
        return false;
    }
    storage.removeItem(scanDocumentKey(target.fileName));
    return writeScanLibrary(
        storage,
        scans.filter((entry) => entry.id !== id),
    );
};

export const loadScanDocument = (
    storage: Storage | undefined,
    record: Pick<ScanRecord, 'fileName'>,
): ScanExportDocument | null => {
    if (!storage) {
        return null;
    }
    const raw = storage.getItem(scanDocumentKey(record.fileName));
    if (!raw) {
        return null;
    }
    return parseScanDocument(raw);
};
