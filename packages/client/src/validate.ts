import {
  DONATE_MARKS,
  INVOICE_TYPES,
  TAX_TYPES,
  type CancelInvoiceInput,
  type CreateInvoiceInput,
  type InvoiceItem,
  type QueryInvoiceInput,
  type ValidationIssue,
} from '@einvoice-tw/contracts';
import { ValidationError, isRepresentableNumber } from '@einvoice-tw/shared';

const ORDER_DATE_PATTERN = /^(\d{4})\/(\d{2})\/(\d{2})$/;
const INVOICE_NUMBER_PATTERN = /^[A-Z]{2}\d{8}$/;
const INVOICE_YEAR_PATTERN = /^\d{4}$/;

function isBlank(value: unknown): boolean {
  return typeof value !== 'string' || value.trim() === '';
}

function isOneOf<T extends string>(values: readonly T[], value: unknown): value is T {
  return values.some((candidate) => candidate === value);
}

function isNonNegativeNumber(value: unknown): boolean {
  return typeof value === 'number' && Number.isFinite(value) && value >= 0;
}

function checkNonNegative(issues: ValidationIssue[], field: string, value: unknown): void {
  if (!isNonNegativeNumber(value)) {
    issues.push({ field, code: 'OUT_OF_RANGE', message: `${field} must be a non-negative number` });
  } else if (typeof value === 'number' && !isRepresentableNumber(value)) {
    issues.push({ field, code: 'INVALID_FORMAT', message: `${field} is too small to send as a decimal` });
  }
}

/**
 * Check a `yyyy/MM/dd` string names a real calendar date.
 */
export function isValidOrderDate(value: string): boolean {
  const match = ORDER_DATE_PATTERN.exec(value);
  if (!match) {
    return false;
  }
  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const date = new Date(Date.UTC(year, month - 1, day));
  return date.getUTCFullYear() === year && date.getUTCMonth() === month - 1 && date.getUTCDate() === day;
}

function checkRequired(issues: ValidationIssue[], field: string, value: unknown): boolean {
  if (isBlank(value)) {
    issues.push({ field, code: 'REQUIRED', message: `${field} is required` });
    return false;
  }
  return true;
}

function checkEnum(issues: ValidationIssue[], field: string, values: readonly string[], value: unknown): void {
  if (!isOneOf(values, value)) {
    issues.push({
      field,
      code: 'INVALID_ENUM',
      message: `${field} must be one of ${values.map((v) => `"${v}"`).join(', ')}`,
    });
  }
}

function checkInvoiceReference(issues: ValidationIssue[], input: QueryInvoiceInput): void {
  if (checkRequired(issues, 'invoiceNumber', input.invoiceNumber) && !INVOICE_NUMBER_PATTERN.test(input.invoiceNumber)) {
    issues.push({
      field: 'invoiceNumber',
      code: 'INVALID_FORMAT',
      message: 'invoiceNumber must be two uppercase letters followed by eight digits',
    });
  }
  if (checkRequired(issues, 'invoiceYear', input.invoiceYear) && !INVOICE_YEAR_PATTERN.test(input.invoiceYear)) {
    issues.push({ field: 'invoiceYear', code: 'INVALID_FORMAT', message: 'invoiceYear must be four digits' });
  }
}

/**
 * Collect every problem with a createInvoice request.
 */
export function validateCreateInvoiceInput(input: CreateInvoiceInput): ValidationIssue[] {
  const issues: ValidationIssue[] = [];

  checkRequired(issues, 'orderId', input.orderId);
  if (checkRequired(issues, 'orderDate', input.orderDate) && !isValidOrderDate(input.orderDate)) {
    issues.push({ field: 'orderDate', code: 'INVALID_FORMAT', message: 'orderDate must be a valid yyyy/MM/dd date' });
  }
  checkRequired(issues, 'payWay', input.payWay);

  checkEnum(issues, 'donateMark', DONATE_MARKS, input.donateMark);
  checkEnum(issues, 'invoiceType', INVOICE_TYPES, input.invoiceType);
  checkEnum(issues, 'taxType', TAX_TYPES, input.taxType);

  if (input.taxRate !== undefined) {
    if (!(isNonNegativeNumber(input.taxRate) && input.taxRate <= 1)) {
      issues.push({ field: 'taxRate', code: 'OUT_OF_RANGE', message: 'taxRate must be a number between 0 and 1' });
    } else if (!isRepresentableNumber(input.taxRate)) {
      issues.push({ field: 'taxRate', code: 'INVALID_FORMAT', message: 'taxRate is too small to send as a decimal' });
    }
  }

  const items: readonly InvoiceItem[] | undefined = input.items;
  if (items === undefined || items.length === 0) {
    issues.push({ field: 'items', code: 'EMPTY_ITEMS', message: 'items must contain at least one item' });
    return issues;
  }

  items.forEach((item, index) => {
    const path = `items[${String(index)}]`;
    checkRequired(issues, `${path}.productionCode`, item.productionCode);
    checkRequired(issues, `${path}.description`, item.description);
    checkNonNegative(issues, `${path}.quantity`, item.quantity);
    checkNonNegative(issues, `${path}.unitPrice`, item.unitPrice);
  });

  return issues;
}

/**
 * Collect every problem with a queryInvoice request.
 */
export function validateQueryInvoiceInput(input: QueryInvoiceInput): ValidationIssue[] {
  const issues: ValidationIssue[] = [];
  checkInvoiceReference(issues, input);
  return issues;
}

/**
 * Collect every problem with a cancelInvoice request.
 */
export function validateCancelInvoiceInput(input: CancelInvoiceInput): ValidationIssue[] {
  const issues: ValidationIssue[] = [];
  checkInvoiceReference(issues, input);
  if (input.remark !== undefined && typeof input.remark !== 'string') {
    issues.push({ field: 'remark', code: 'INVALID_FORMAT', message: 'remark must be a string' });
  }
  return issues;
}

/**
 * Throw a ValidationError when any issue was found.
 */
export function assertValid(operation: string, issues: ValidationIssue[]): void {
  if (issues.length === 0) {
    return;
  }
  throw new ValidationError(
    `Invalid ${operation} input: ${issues.map((issue) => issue.message).join('; ')}`,
    issues,
    { operation },
  );
}
