export * from './types';
export * from './constants/floorPlan';

export * from './utils/rigidTransform';
export * from './utils/transformDecomposer';
export * from './utils/trailHistory';
export * from './utils/viewportFit';
export * from './utils/compass';
export * from './utils/snapshot';

export * from './overlays';

export * from './services/devicePoseEstimator';
export * from './services/dimensionExtractor';
export * from './services/scanDocument';
export * from './services/scanLibraryStorage';
export * from './services/floorPlanSettingsStorage';
export * from './services/floorPlanSession';

export {
    LogProvider,
    appendLogEntry,
    selectScopeEntries,
    useLogStore,
    MAX_LOG_ENTRIES,
} from './context/LogContext';
export type { AppendLogParams, LogEntry, LogScope, LogSeverity, LogStore } from './context/LogContext';
export { useFloorPlanSession } from './hooks/useFloorPlanSession';
export type {
    UseFloorPlanSessionOptions,
    UseFloorPlanSessionResult,
} from './hooks/useFloorPlanSession';
export { default as FloorPlanCanvas } from './components/FloorPlanCanvas';
