import { LeaseConflictError } from "../entities/errors.js";

export interface Lease {
    readonly resourceId: string;
    readonly holder: string;
    readonly expiresAt: number;
}

export interface LeaseManager {
    /** @throws LeaseConflictError when another holder has an unexpired lease */
    acquire(resourceId: string, holder: string, ttlMs: number): Lease;
    release(lease: Lease): void;
    current(resourceId: string): Lease | undefined;
}

export function createLeaseManager(now: () => number = Date.now): LeaseManager {
    const leases = new Map<string, Lease>();

    const current = (resourceId: string): Lease | undefined => {
        const lease = leases.get(resourceId);
        if (lease && lease.expiresAt <= now()) {
            leases.delete(resourceId);
            return undefined;
        }
        return lease;
    };

    return {
        acquire(resourceId, holder, ttlMs) {
            const existing = current(resourceId);
            if (existing && existing.holder !== holder) {
                throw new LeaseConflictError(resourceId, existing.holder);
            }
            const lease = { resourceId, holder, expiresAt: now() + ttlMs };
            leases.set(resourceId, lease);
            return lease;
        },
        release(lease) {
            // a lease that expired and was taken over belongs to its new holder
            if (leases.get(lease.resourceId)?.holder === lease.holder) {
                leases.delete(lease.resourceId);
            }
        },
        current,
    };
}
