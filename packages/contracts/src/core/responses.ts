/**
 * Monetary amount as a decimal string, e.g. "1050" or "99.9".
 * Kept as a string so sums are exact.
 */
export type DecimalAmount = string;

/**
 * Result of a successful createInvoice call
 */
export interface CreateInvoiceResponse {
  /** 10-character invoice number, e.g. `WP20260002` */
  readonly invoiceNumber: string;

  /** 4-digit random code printed on the invoice */
  readonly randomCode: string;

  /** Characters 3-6 of the invoice number */
  readonly invoiceYear: string;
}

/**
 * Result of queryInvoice. Every parsed field may be missing;
 * `rawXml` always holds the vendor payload.
 */
export interface QueryInvoiceResponse {
  readonly invoiceNumber: string;
  readonly invoiceDate?: string;
  readonly invoiceTime?: string;
  readonly orderId?: string;
  readonly randomCode?: string;
  readonly buyerIdentifier?: string;
  readonly buyerName?: string;
  readonly sellerIdentifier?: string;
  readonly sellerName?: string;
  readonly invoiceStatus?: string;
  readonly donateMark?: string;
  readonly carrierType?: string;
  readonly carrierId?: string;
  readonly npoban?: string;
  readonly taxType?: string;
  readonly salesAmount?: number;
  readonly taxAmount?: number;
  readonly totalAmount?: number;

  /** Unescaped invoice XML as returned by the vendor */
  readonly rawXml: string;
}

/**
 * Result of cancelInvoice
 */
export interface CancelInvoiceResponse {
  readonly success: boolean;

  /** `C0` on success, the vendor's error code otherwise */
  readonly code: string;

  /** Vendor payload when the cancellation failed */
  readonly message?: string;
}

/**
 * Amounts derived from an invoice's product lines
 */
export interface InvoiceAmounts {
  readonly salesAmount: DecimalAmount;
  readonly taxAmount: DecimalAmount;
  readonly totalAmount: DecimalAmount;
}
