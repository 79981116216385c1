import React, {
    createContext,
    useCallback,
    useContext,
    useMemo,
    useRef,
    useState,
    type PropsWithChildren,
} from 'react';

export type LogSeverity = 'info' | 'warning' | 'error';

/** Area of the floor plan a log entry comes from. */
export type LogScope = 'capture' | 'export' | 'library' | 'settings';

export interface LogEntry {
    id: string;
    scope: LogScope;
    severity: LogSeverity;
    message: string;
    timestamp: number;
    metadata?: Record<string, unknown>;
}

export interface AppendLogParams {
    scope: LogScope;
    severity: LogSeverity;
    message: string;
    metadata?: Record<string, unknown>;
    timestamp?: number;
}

interface LogContextValue {
    entries: LogEntry[];
    append: (entry: AppendLogParams) => void;
    clear: () => void;
}

export const MAX_LOG_ENTRIES = 200;

const LogContext = createContext<LogContextValue | undefined>(undefined);

const CONSOLE_SINKS: Record<LogSeverity, (message: string, metadata?: unknown) => void> = {
    info: (message, metadata) => console.info(message, metadata ?? ''),
    warning: (message, metadata) => console.warn(message, metadata ?? ''),
    error: (message, metadata) => console.error(message, metadata ?? ''),
};

/** Newest first, capped at `limit`. */
export const appendLogEntry = (
    entries: readonly LogEntry[],
    entry: LogEntry,
    limit: number = MAX_LOG_ENTRIES,
): LogEntry[] => [entry, ...entries].slice(0, Math.max(0, limit));

/** Entries of one scope, newest first. */
export const selectScopeEntries = (entries: readonly LogEntry[], scope: LogScope): LogEntry[] =>
    entries.filter((entry) => entry.scope === scope);

interface LogProviderProps extends PropsWithChildren {
    limit?: number;
    /** Mirror every entry to the console as `[scope] message`. */
    echo?: boolean;
}

export const LogProvider: React.FC<LogProviderProps> = ({
    children,
    limit = MAX_LOG_ENTRIES,
    echo = false,
}) => {
    const [entries, setEntries] = useState<LogEntry[]>([]);
    const sequenceRef = useRef(0);

    const append = useCallback(
        (entry: AppendLogParams) => {
            sequenceRef.current += 1;
            const timestamp = entry.timestamp ?? Date.now();
            const nextEntry: LogEntry = {
                id: `log-${timestamp}-${sequenceRef.current}`,
                scope: entry.scope,
                severity: entry.severity,
                message: entry.message,
                metadata: entry.metadata,
                timestamp,
            };
            if (echo) {
                CONSOLE_SINKS[entry.severity](`[${entry.scope}] ${entry.message}`, entry.metadata);
            }
            setEntries((prev) => appendLogEntry(prev, nextEntry, limit));
        },
        [echo, limit],
    );

    const clear = useCallback(() => setEntries([]), []);

    const value = useMemo<LogContextValue>(
        () => ({ entries, append, clear }),
        [append, clear, entries],
    );

    return <LogContext.Provider value={value}>{children}</LogContext.Provider>;
};

const useLogContext = (): LogContextValue => {
    const context = useContext(LogContext);
    if (!context) {
        throw new Error('useLogStore must be used within a LogProvider');
    }
    return context;
};

type ScopedLogger = (scope: LogScope, message: string, metadata?: Record<string, unknown>) => void;

export interface LogStore {
    entries: LogEntry[];
    logInfo: ScopedLogger;
    logWarning: ScopedLogger;
    logError: ScopedLogger;
    clear: () => void;
}

export const useLogStore = (): LogStore => {
    const { entries, append, clear } = useLogContext();

    const logInfo = useCallback<ScopedLogger>(
        (scope, message, metadata) => append({ severity: 'info', scope, message, metadata }),
        [append],
    );

    const logWarning = useCallback<ScopedLogger>(
        (scope, message, metadata) => append({ severity: 'warning', scope, message, metadata }),
        [append],
    );

    const logError = useCallback<ScopedLogger>(
        (scope, message, metadata) => append({ severity: 'error', scope, message, metadata }),
        [append],
    );

    return { entries, logInfo, logWarning, logError, clear };
};
