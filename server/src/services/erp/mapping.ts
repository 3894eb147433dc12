/**
 * ERP <-> domain mapping
 *
 * Integer status codes stop here; the rest of the system only sees MoStatus.
 */

import type { MoStatus, RemoteOrder, WritableMoStatus } from '@lotrec/shared';
import { ERP_STATUS_CODES, ERP_STATUS_VALUES } from '../../config/index.js';
import type { ErpManufacturingOrder } from './schemas.js';

export function statusFromErp(code: number): MoStatus {
    return ERP_STATUS_CODES[code] ?? 'other';
}

export function statusToErp(status: WritableMoStatus): number {
    return ERP_STATUS_VALUES[status];
}

export function toRemoteOrder(wire: ErpManufacturingOrder): RemoteOrder {
    const status = statusFromErp(wire.status);
    return {
        orderId: wire.man_ord_id,
        orderNumber: wire.code,
        itemCode: wire.item_code,
        itemTitle: wire.item_title,
        status,
        statusCode: status === 'other' ? wire.status : null,
        expectedQuantity: wire.quantity,
        actualQuantity: wire.actual_quantity,
        unit: wire.unit,
        targetLots: wire.target_lots.map((lot) => lot.code),
    };
}
