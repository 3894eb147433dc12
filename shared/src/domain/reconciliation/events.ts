import type { ProductionEvent } from './types.js';

/**
 * Returns the problems that keep an event from reaching the ERP.
 * Empty array means the event is usable.
 */
export function validateProductionEvent(event: ProductionEvent): string[] {
    const problems: string[] = [];
    if (!event.lotCode || !event.lotCode.trim()) {
        problems.push('Lot code is required');
    }
    if (!Number.isFinite(event.producedQuantity) || event.producedQuantity <= 0) {
        problems.push(`Produced quantity must be greater than zero (got ${event.producedQuantity})`);
    }
    if (Number.isNaN(event.capturedAt.getTime())) {
        problems.push('Capture timestamp is invalid');
    }
    return problems;
}

export function createProductionEvent(
    lotCode: string,
    producedQuantity: number,
    unitOfMeasure: string | null = null,
    capturedAt: Date = new Date()
): ProductionEvent {
    return Object.freeze({
        lotCode: lotCode.trim(),
        producedQuantity,
        unitOfMeasure: unitOfMeasure && unitOfMeasure.trim() ? unitOfMeasure.trim() : null,
        capturedAt,
    });
}
