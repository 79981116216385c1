import { useCallback, useMemo, useRef, useState } from 'react';

import type { FloorPlanSettings } from '@/constants/floorPlan';
import { useLogStore } from '@/context/LogContext';
import {
    buildExportDocument,
    summarizeSnapshot,
    type SnapshotSummary,
} from '@/services/dimensionExtractor';
import {
    getInitialFloorPlanSettings,
    persistFloorPlanSettings,
    sanitizeFloorPlanSettings,
} from '@/services/floorPlanSettingsStorage';
import {
    applyDevicePose,
    applyHeading,
    applyPanDrag,
    applySettings,
    applySnapshot,
    commitPanDrag,
    createFloorPlanSession,
    resetFloorPlanSession,
    type FloorPlanSessionState,
} from '@/services/floorPlanSession';
import { serializeScanDocument, snapshotFromDocument } from '@/services/scanDocument';
import {
    deleteScan,
    loadScanDocument,
    loadScanLibrary,
    saveScan,
} from '@/services/scanLibraryStorage';
import type { CanvasPoint, RigidTransform, ScanExportDocument, ScanRecord, Snapshot } from '@/types';

export interface UseFloorPlanSessionOptions {
    /** Defaults to `window.localStorage` when available. */
    storage?: Storage;
    now?: () => number;
    /** Id factory for saved scans. */
    createId?: () => string;
}

export interface UseFloorPlanSessionResult {
    session: FloorPlanSessionState;
    summary: SnapshotSummary;
    scans: ScanRecord[];

    ingestSnapshot: (snapshot: Snapshot) => void;
    ingestDevicePose: (transform: RigidTransform) => void;
    setHeading: (heading: number | null) => void;
    dragPan: (translation: CanvasPoint) => void;
    endPan: () => void;
    reset: () => void;
    updateSettings: (settings: FloorPlanSettings) => void;

    exportDocument: () => ScanExportDocument | null;
    exportJson: () => string | null;
    saveCurrentScan: (name: string) => ScanRecord | null;
    openScan: (record: ScanRecord) => boolean;
    removeScan: (id: string) => void;
}

const resolveStorage = (): Storage | undefined =>
    typeof window !== 'undefined' ? window.localStorage : undefined;

/**
 * Holds the live floor plan session for a capture screen and the saved scan library.
 * Snapshot, export and library events are reported through the log store.
 */
export function useFloorPlanSession(
    options: UseFloorPlanSessionOptions = {},
): UseFloorPlanSessionResult {
    const { logInfo, logWarning, logError } = useLogStore();
    const storage = useMemo(() => options.storage ?? resolveStorage(), [options.storage]);
    const now = options.now ?? Date.now;
    const { createId } = options;

    const [session, setSession] = useState<FloorPlanSessionState>(() =>
        createFloorPlanSession(getInitialFloorPlanSettings(storage)),
    );
    const [scans, setScans] = useState<ScanRecord[]>(() => loadScanLibrary(storage));
    const capturing = useRef(false);

    const summary = useMemo(() => summarizeSnapshot(session.snapshot), [session.snapshot]);

    const ingestSnapshot = useCallback(
        (snapshot: Snapshot) => {
            if (!capturing.current) {
                capturing.current = true;
                logInfo('capture', 'Receiving room snapshots', {
                    walls: snapshot.walls.length,
                });
            }
            const timestamp = now();
            setSession((prev) => applySnapshot(prev, snapshot, timestamp));
        },
        [logInfo, now],
    );

    const ingestDevicePose = useCallback(
        (transform: RigidTransform) => {
            const timestamp = now();
            setSession((prev) => applyDevicePose(prev, transform, timestamp));
        },
        [now],
    );

    const setHeading = useCallback((heading: number | null) => {
        setSession((prev) => applyHeading(prev, heading));
    }, []);

    const dragPan = useCallback((translation: CanvasPoint) => {
        setSession((prev) => applyPanDrag(prev, translation));
    }, []);

    const endPan = useCallback(() => {
        setSession((prev) => commitPanDrag(prev));
    }, []);

    const reset = useCallback(() => {
        capturing.current = false;
        setSession((prev) => resetFloorPlanSession(prev));
        logInfo('capture', 'Floor plan reset');
    }, [logInfo]);

    const updateSettings = useCallback(
        (settings: FloorPlanSettings) => {
            const sanitized = sanitizeFloorPlanSettings(settings);
            persistFloorPlanSettings(storage, sanitized);
            setSession((prev) => applySettings(prev, sanitized));
            logInfo('settings', 'Floor plan settings updated', { ...sanitized });
        },
        [logInfo, storage],
    );

    const exportDocument = useCallback((): ScanExportDocument | null => {
        if (!session.snapshot) {
            logWarning('export', 'Nothing to export yet');
            return null;
        }
        return buildExportDocument(session.snapshot);
    }, [logWarning, session.snapshot]);

    const exportJson = useCallback((): string | null => {
        const document = exportDocument();
        if (!document) {
            return null;
        }
        logInfo('export', 'Exported room dimensions', { ...document.dimensions });
        return serializeScanDocument(document);
    }, [exportDocument, logInfo]);

    const saveCurrentScan = useCallback(
        (name: string): ScanRecord | null => {
            const document = exportDocument();
            if (!document) {
                return null;
            }
            const record = saveScan({
                storage,
                name,
                document,
                now: new Date(now()),
                createId,
            });
            if (!record) {
                logError('library', 'Failed to save scan', { name });
                return null;
            }
            setScans(loadScanLibrary(storage));
            logInfo('library', `Saved scan "${record.name}"`, { id: record.id });
            return record;
        },
        [createId, exportDocument, logError, logInfo, now, storage],
    );

    const openScan = useCallback(
        (record: ScanRecord): boolean => {
            const document = loadScanDocument(storage, record);
            if (!document) {
                logError('library', `Scan "${record.name}" could not be read`, { id: record.id });
                return false;
            }
            capturing.current = false;
            const snapshot = snapshotFromDocument(document);
            const timestamp = now();
            setSession((prev) => applySnapshot(resetFloorPlanSession(prev), snapshot, timestamp));
            logInfo('library', `Opened scan "${record.name}"`, { id: record.id });
            return true;
        },
        [logError, logInfo, now, storage],
    );

    const removeScan = useCallback(
        (id: string) => {
            if (!deleteScan(storage, id)) {
                logWarning('library', 'Scan not found', { id });
                return;
            }
            setScans(loadScanLibrary(storage));
            logInfo('library', 'Deleted scan', { id });
        },
        [logInfo, logWarning, storage],
    );

    return {
        session,
        summary,
        scans,
        ingestSnapshot,
        ingestDevicePose,
        setHeading,
        dragPan,
        endPan,
        reset,
        updateSettings,
        exportDocument,
        exportJson,
        saveCurrentScan,
        openScan,
        removeScan,
    };
}
