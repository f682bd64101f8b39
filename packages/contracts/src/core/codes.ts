/**
 * Enumerated code tables of the Cetustek e-invoice service.
 */

/**
 * Donation / carrier mark
 *
 * - `0`: not donated (paper or carrier)
 * - `1`: donated to the charity named by NPOBAN
 * - `2`: stored on a carrier
 */
export const DONATE_MARKS = ['0', '1', '2'] as const;
export type DonateMark = (typeof DONATE_MARKS)[number];

/**
 * Invoice type
 *
 * - `07`: general tax invoice
 * - `08`: special tax invoice
 */
export const INVOICE_TYPES = ['07', '08'] as const;
export type InvoiceType = (typeof INVOICE_TYPES)[number];

/**
 * Tax type
 *
 * - `1`: taxable
 * - `2`: zero rated
 * - `3`: tax free
 * - `4`: special rate
 * - `5`: taxable, special-purpose zero rated
 * - `9`: mixed
 */
export const TAX_TYPES = ['1', '2', '3', '4', '5', '9'] as const;
export type TaxType = (typeof TAX_TYPES)[number];

/** Default business tax rate (5%) */
export const DEFAULT_TAX_RATE = 0.05;

/** Vendor return code of a successful cancellation */
export const CANCEL_SUCCESS_CODE = 'C0';

/**
 * SOAP operations exposed by the service
 */
export type SoapAction = 'CreateInvoiceV3' | 'QueryInvoice' | 'CancelInvoice' | 'CancelInvoiceNoCheck';
