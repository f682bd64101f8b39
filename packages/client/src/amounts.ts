import { DEFAULT_TAX_RATE, type InvoiceAmounts, type InvoiceItem, type TaxType } from '@einvoice-tw/contracts';
import { add, fromNumber, multiply, round, sum } from '@einvoice-tw/shared';

const TAXED_TYPES: ReadonlySet<TaxType> = new Set<TaxType>(['1', '4']);

/**
 * Compute sales, tax and total amounts of an invoice in whole NTD.
 *
 * Line amounts are summed exactly, then rounded half-up. `taxRate` applies
 * to taxable (`1`) and special-rate (`4`) invoices; the other tax types
 * carry no tax.
 *
 * @example
 * ```typescript
 * calculateInvoiceAmounts(
 *   [{ productionCode: 'P1', description: 'Widget', quantity: 2, unitPrice: 500 }],
 *   '1',
 * );
 * // { salesAmount: '1000', taxAmount: '50', totalAmount: '1050' }
 * ```
 */
export function calculateInvoiceAmounts(
  items: readonly InvoiceItem[],
  taxType: TaxType,
  taxRate: number = DEFAULT_TAX_RATE,
): InvoiceAmounts {
  const lineAmounts = items.map((item) => multiply(fromNumber(item.quantity), fromNumber(item.unitPrice)));
  const salesAmount = round(sum(lineAmounts));
  const taxAmount = TAXED_TYPES.has(taxType) ? round(multiply(salesAmount, fromNumber(taxRate))) : '0';

  return {
    salesAmount,
    taxAmount,
    totalAmount: add(salesAmount, taxAmount),
  };
}
