/**
 * Order Update
 *
 * Writes the produced quantity and the target status in one ERP request.
 * The order is read first so a repeated call is a no-op, and read again
 * afterwards so an unconfirmed write is reported as transient.
 */

import {
    isTerminalMoStatus,
    lotCodesMatch,
    quantitiesEqual,
    reconciliationFailure,
    reconciliationSuccess,
    toReconciliationFailure,
    type MoStatus,
    type ReconciliationResult,
    type RemoteOrder,
    type WritableMoStatus,
} from '@lotrec/shared';
import { reconciliationLogger } from '../../utils/logger.js';
import type { ErpGateway } from '../erp/gateway.js';

export interface UpdateOutcome {
    order: RemoteOrder;
    statusBefore: MoStatus;
    /** True when the order already carried the requested values */
    noop: boolean;
}

export class OrderUpdate {
    private readonly gateway: ErpGateway;

    constructor(gateway: ErpGateway) {
        this.gateway = gateway;
    }

    async apply(
        orderId: number,
        actualQuantity: number,
        lotCode: string,
        targetStatus: WritableMoStatus = 'done'
    ): Promise<ReconciliationResult<UpdateOutcome>> {
        if (!Number.isFinite(actualQuantity) || actualQuantity <= 0) {
            return reconciliationFailure('VALIDATION', `Actual quantity must be greater than zero (got ${actualQuantity})`);
        }
        if (!lotCode.trim()) {
            return reconciliationFailure('VALIDATION', 'Lot code is required');
        }

        const log = reconciliationLogger.child({ orderId, lotCode, actualQuantity, targetStatus });

        try {
            const current = await this.gateway.getManufacturingOrder(orderId);
            if (!current) {
                return reconciliationFailure('ORDER_MISSING', `Manufacturing order ${orderId} no longer exists`, { orderId });
            }

            if (current.status === 'other') {
                return reconciliationFailure(
                    'UNKNOWN_STATUS',
                    `${current.orderNumber} has ERP status ${current.statusCode ?? 'unknown'}, which cannot be closed from here`,
                    { orderId, status: current.statusCode }
                );
            }

            if (current.status === targetStatus && quantitiesEqual(current.actualQuantity, actualQuantity)) {
                log.info({ orderNumber: current.orderNumber }, 'Order already carries the requested values');
                return reconciliationSuccess({ order: current, statusBefore: current.status, noop: true });
            }

            if (isTerminalMoStatus(current.status)) {
                return reconciliationFailure(
                    'ALREADY_TRANSITIONED',
                    `${current.orderNumber} is already ${current.status} with actual quantity ${current.actualQuantity ?? 'unset'}`,
                    { orderId, status: current.status, actualQuantity: current.actualQuantity }
                );
            }

            if (current.targetLots.length > 0 && !current.targetLots.some((lot) => lotCodesMatch(lot, lotCode))) {
                log.warn({ orderNumber: current.orderNumber, targetLots: current.targetLots }, 'Lot code is not among the order target lots');
            }

            await this.gateway.updateManufacturingOrder(orderId, { actualQuantity, status: targetStatus });

            const confirmed = await this.gateway.getManufacturingOrder(orderId);
            if (
                !confirmed ||
                confirmed.status !== targetStatus ||
                !quantitiesEqual(confirmed.actualQuantity, actualQuantity)
            ) {
                return reconciliationFailure(
                    'UNCONFIRMED',
                    `${current.orderNumber} did not read back as ${targetStatus} with actual quantity ${actualQuantity}`,
                    { orderId, observedStatus: confirmed?.status ?? null, observedQuantity: confirmed?.actualQuantity ?? null }
                );
            }

            log.info({ orderNumber: confirmed.orderNumber, statusBefore: current.status }, 'Order updated');
            return reconciliationSuccess({ order: confirmed, statusBefore: current.status, noop: false });
        } catch (error) {
            return { success: false, error: toReconciliationFailure(error) };
        }
    }
}
