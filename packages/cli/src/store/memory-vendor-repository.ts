import type { Vendor } from '@txnflow/shared';
import type { VendorRepository } from './types.js';

export class InMemoryVendorRepository implements VendorRepository {
    private readonly vendors = new Map<string, Vendor>();

    constructor(initial: readonly Vendor[] = []) {
        for (const vendor of initial) {
            this.vendors.set(vendor.vendor_id, structuredClone(vendor));
        }
    }

    async list(): Promise<Vendor[]> {
        return Array.from(this.vendors.values()).map((vendor) => structuredClone(vendor));
    }

    async get(vendorId: string): Promise<Vendor | undefined> {
        const vendor = this.vendors.get(vendorId);
        return vendor ? structuredClone(vendor) : undefined;
    }

    async insertIfAbsent(vendor: Vendor): Promise<boolean> {
        if (this.vendors.has(vendor.vendor_id)) {
            return false;
        }
        this.vendors.set(vendor.vendor_id, structuredClone(vendor));
        return true;
    }

    async compareAndSwap(next: Vendor, expectedVersion: number): Promise<boolean> {
        const current = this.vendors.get(next.vendor_id);
        if (!current || current.version !== expectedVersion) {
            return false;
        }
        this.vendors.set(next.vendor_id, structuredClone(next));
        return true;
    }
}
