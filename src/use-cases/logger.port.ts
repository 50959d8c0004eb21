export interface ReconcileLogger {
    info(message: string): void;
    warn(message: string): void;
    debug(message: string): void;
}
