import type { DonateMark, InvoiceType, TaxType } from './codes.js';

/**
 * A single product line of an invoice
 */
export interface InvoiceItem {
  /** Seller's product code */
  readonly productionCode: string;

  /** Line description printed on the invoice */
  readonly description: string;

  /** Quantity (non-negative) */
  readonly quantity: number;

  /** Unit price in NTD (non-negative) */
  readonly unitPrice: number;

  /** Unit of measure, e.g. "件" */
  readonly unit?: string;
}

/**
 * Input for issuing a new invoice
 */
export interface CreateInvoiceInput {
  /** Merchant order id, unique per tenant */
  readonly orderId: string;

  /** Order date, `yyyy/MM/dd` */
  readonly orderDate: string;

  readonly donateMark: DonateMark;
  readonly invoiceType: InvoiceType;
  readonly taxType: TaxType;

  /** Payment method code from the vendor's code table */
  readonly payWay: string;

  /** Product lines, in print order. Must not be empty. */
  readonly items: readonly InvoiceItem[];

  /** Buyer's 8-digit unified business number (B2B) */
  readonly buyerIdentifier?: string;
  readonly buyerName?: string;
  readonly buyerAddress?: string;
  readonly buyerEmail?: string;

  /** Carrier type code, e.g. `3J0002` for mobile barcode */
  readonly carrierType?: string;
  readonly carrierId1?: string;
  readonly carrierId2?: string;

  /** Love code of the receiving charity when `donateMark` is `1` */
  readonly npoban?: string;

  /**
   * Tax rate as a fraction
   * @default 0.05
   */
  readonly taxRate?: number;

  readonly remark?: string;
}

/**
 * Input for looking up an issued invoice
 */
export interface QueryInvoiceInput {
  /** Two letters followed by eight digits, e.g. `WP20260002` */
  readonly invoiceNumber: string;

  /** Four-digit year */
  readonly invoiceYear: string;
}

/**
 * Input for voiding an issued invoice
 */
export interface CancelInvoiceInput {
  readonly invoiceNumber: string;
  readonly invoiceYear: string;

  /** Reason for voiding. Sent empty when omitted. */
  readonly remark?: string;

  /** Number of the return tax document, for special tax invoices */
  readonly returnTaxDocumentNumber?: string;
}

/**
 * Options for cancelInvoice
 */
export interface CancelInvoiceOptions {
  /**
   * Use the vendor's CancelInvoiceNoCheck action, which skips
   * the vendor-side state checks.
   * @default false
   */
  readonly noCheck?: boolean;
}
