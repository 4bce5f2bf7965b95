/**
 * Serialized row format handed to persistence: one flat JSON object per row
 * with snake_case keys. The in-memory `degradedFields` marker is not part of
 * the record. Invoice numbers are written as decimal digit strings since they
 * may not fit a JSON number.
 */

import { toIsoDate } from './metadataExtractor';
import type { InvoiceMetadata, LineItemRow } from './types';

export interface InvoiceMetadataRecord {
  invoice_number: string | null;
  billing_cycle_date: string | null;
  currency: string | null;
}

export interface LineItemRecord {
  invoice_number: string | null;
  billing_cycle_date: string | null;
  currency: string | null;
  event_code: string;
  description: string;
  service_code: string;
  uom: string;
  quantity_amount: number;
  rate: number;
  charge: number;
  tax_amount: number;
  total_charge: number;
}

/**
 * Provenance appended by the pipeline after extraction.
 */
export interface RecordProvenance {
  file_id: string;
  file_name: string;
  processing_timestamp: string;
}

export type EnrichedLineItemRecord = LineItemRecord & RecordProvenance;

function toInvoiceNumberText(invoiceNumber: bigint | null): string | null {
  return invoiceNumber === null ? null : invoiceNumber.toString();
}

export function toMetadataRecord(metadata: InvoiceMetadata): InvoiceMetadataRecord {
  return {
    invoice_number: toInvoiceNumberText(metadata.invoiceNumber),
    billing_cycle_date: toIsoDate(metadata.billingCycleDate),
    currency: metadata.currency,
  };
}

export function toLineItemRecord(row: LineItemRow): LineItemRecord {
  return {
    invoice_number: toInvoiceNumberText(row.invoiceNumber),
    billing_cycle_date: row.billingCycleDate,
    currency: row.currency,
    event_code: row.eventCode,
    description: row.description,
    service_code: row.serviceCode,
    uom: row.uom,
    quantity_amount: row.quantityAmount,
    rate: row.rate,
    charge: row.charge,
    tax_amount: row.taxAmount,
    total_charge: row.totalCharge,
  };
}

export function enrichRecords(
  rows: readonly LineItemRow[],
  provenance: RecordProvenance
): EnrichedLineItemRecord[] {
  return rows.map((row) => ({ ...toLineItemRecord(row), ...provenance }));
}
