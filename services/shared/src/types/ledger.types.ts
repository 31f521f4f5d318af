// Type definitions for domain models

export interface Item {
     id: number;
     name: string;
     description?: string;
     createdAt: Date;
}

export interface CreateItemRequest {
     name: string;
     description?: string;
}

export type PurchaseType = 'domestic' | 'imported';

export interface Purchase {
     id: number;
     itemId: number;
     quantity: number;
     type: PurchaseType;
     supplier: string;
     unitPrice: number;
     createdBy: string;
     purchaseDate: Date;
     lot?: Lot;
}

export interface CreatePurchaseRequest {
     itemId: number;
     quantity: number;
     type: PurchaseType;
     supplier: string;
     unitPrice: number;
     createdBy: string;
     lotNumber?: string;
     manufacturingDate?: string;
     expiryDate?: string;
}

export interface Lot {
     id: number;
     purchaseId: number;
     itemId: number;
     lotNumber: string;
     manufacturingDate?: string;
     expiryDate?: string;
     initialQuantity: number;
     remainingQuantity: number;
     createdAt: Date;
}

export interface CreateLotRequest {
     purchaseId: number;
     lotNumber?: string;
     manufacturingDate?: string;
     expiryDate?: string;
     initialQuantity: number;
}

export interface JournalEntry {
     id: number;
     itemId: number;
     lotId: number | null;
     quantity: number;
     updatedBy: string;
     timestamp: Date;
}

export interface AppendJournalEntryRequest {
     itemId: number;
     quantity: number;
     lotId?: number | null;
     actor: string;
}

// One (lot, amount) pair consumed by a withdrawal
export interface LotAllocation {
     lotId: number;
     quantity: number;
}

export interface LotAllocationRecord extends LotAllocation {
     id: number;
     inventoryRecordId: number;
     createdAt: Date;
}

export interface InventoryChangeRequest {
     itemId: number;
     quantity: number;
     lotId?: number;
     actor: string;
}

export interface RecordedInventoryChange {
     entry: JournalEntry;
     allocations: LotAllocation[];
}

export interface Page {
     skip?: number;
     limit?: number;
}

// Domain events
export type DomainEventType = 'InventoryRecorded' | 'LotDepleted' | 'PurchaseReceived';

export interface InventoryRecordedEvent {
     entryId: number;
     itemId: number;
     lotId: number | null;
     quantity: number;
     actor: string;
     allocations: LotAllocation[];
     timestamp: string;
}

export interface LotDepletedEvent {
     lotId: number;
     lotNumber: string;
     itemId: number;
     timestamp: string;
}

export interface PurchaseReceivedEvent {
     purchaseId: number;
     itemId: number;
     quantity: number;
     type: PurchaseType;
     lotId: number | null;
     timestamp: string;
}
