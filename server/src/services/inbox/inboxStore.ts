/**
 * Pending production events as read from the inbox table.
 * `quantity` is whatever the capture side wrote (pg returns numerics as strings).
 */
export interface InboxRow {
    id: number;
    lotCode: string;
    quantity: string | number | null;
    unitOfMeasure: string | null;
    insertedAt: Date;
}

export interface InboxStore {
    /** Unprocessed rows, oldest first */
    fetchPending(limit: number): Promise<InboxRow[]>;
    /**
     * Acknowledge a row once. Returns false when it was already acknowledged.
     * `failureReason` null means success.
     */
    markProcessed(id: number, failureReason: string | null): Promise<boolean>;
}
