import type { RemoteOrder, WritableMoStatus } from '@lotrec/shared';

export interface ManufacturingOrderFilters {
    itemCode?: string;
    status?: WritableMoStatus;
}

export interface ManufacturingOrderUpdate {
    actualQuantity: number;
    status: WritableMoStatus;
}

/**
 * What the reconciliation services need from the ERP.
 * Methods throw ReconciliationError on failure.
 */
export interface ErpGateway {
    /** Every page of the listing, in ERP order */
    listManufacturingOrders(filters?: ManufacturingOrderFilters): Promise<RemoteOrder[]>;
    /** null when the order does not exist */
    getManufacturingOrder(orderId: number): Promise<RemoteOrder | null>;
    /** One request carrying both the quantity and the status */
    updateManufacturingOrder(orderId: number, update: ManufacturingOrderUpdate): Promise<void>;
}
