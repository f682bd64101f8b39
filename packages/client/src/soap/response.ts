/**
 * SOAP response parsing for the Cetustek invoice API.
 *
 * Every operation answers with a single `<return>` element:
 * - CreateInvoiceV3: `<invoiceNumber>;<randomCode>` or an error code
 * - QueryInvoice: the escaped invoice XML or an error code
 * - CancelInvoice: `C0` or an error code
 */

import { XMLParser, XMLValidator } from 'fast-xml-parser';
import {
  CANCEL_SUCCESS_CODE,
  type CancelInvoiceResponse,
  type CreateInvoiceResponse,
  type QueryInvoiceResponse,
} from '@einvoice-tw/contracts';
import { ApiError, SdkError } from '@einvoice-tw/shared';

const parser = new XMLParser({
  ignoreAttributes: true,
  removeNSPrefix: true,
  parseTagValue: false,
  trimValues: true,
  processEntities: true,
  htmlEntities: true,
});

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Depth-first search for the first element whose name matches.
 * Returns undefined when no element matches.
 */
function findElement(node: unknown, matches: (name: string) => boolean): unknown {
  if (Array.isArray(node)) {
    for (const item of node) {
      const found = findElement(item, matches);
      if (found !== undefined) return found;
    }
    return undefined;
  }

  if (!isRecord(node)) {
    return undefined;
  }

  for (const [name, value] of Object.entries(node)) {
    if (matches(name)) return value;
  }
  for (const value of Object.values(node)) {
    const found = findElement(value, matches);
    if (found !== undefined) return found;
  }
  return undefined;
}

/**
 * Text content of a parsed element, if it has any
 */
function textOf(value: unknown): string | undefined {
  if (typeof value === 'string') return value;
  if (Array.isArray(value)) return textOf(value[0]);
  if (isRecord(value)) {
    const text = value['#text'];
    return typeof text === 'string' ? text : undefined;
  }
  return undefined;
}

function parseXml(xml: string): unknown {
  if (XMLValidator.validate(xml) !== true) {
    return undefined;
  }
  const parsed: unknown = parser.parse(xml);
  return parsed;
}

// Raw content of the first `<return>` element, namespace prefix allowed
const RETURN_ELEMENT_PATTERN = /<(?:[A-Za-z_][\w.-]*:)?return(?:\s[^>]*)?>([\s\S]*?)<\/(?:[A-Za-z_][\w.-]*:)?return\s*>/;

function hasChildElements(element: unknown): boolean {
  return isRecord(element) && Object.keys(element).some((key) => key !== '#text');
}

/**
 * Entity-decode text content without normalising its line endings
 */
function decodeText(raw: string): string | undefined {
  const parsed = parseXml(`<return>${raw.replace(/\r/g, '&#13;')}</return>`);
  return textOf(findElement(parsed, (name) => name === 'return'));
}

/**
 * Extract the trimmed content of the `<return>` element.
 *
 * Text content is entity-decoded with its line endings kept as sent.
 * When the element holds child elements instead of escaped text, their
 * markup is returned as it appears in the body.
 *
 * @throws SdkError (`INVALID_RESPONSE`) when the body is not XML or has no usable `<return>`
 */
export function extractReturnValue(responseXml: string): string {
  const parsed = parseXml(responseXml);
  if (parsed === undefined) {
    throw new SdkError('Invalid response: body is not well-formed XML', 'INVALID_RESPONSE');
  }

  const element = findElement(parsed, (name) => name === 'return');
  if (element === undefined) {
    throw new SdkError('Invalid response: missing <return> element', 'INVALID_RESPONSE');
  }

  const raw = RETURN_ELEMENT_PATTERN.exec(responseXml)?.[1];
  const value = raw === undefined ? undefined : hasChildElements(element) ? raw : decodeText(raw);
  if (value === undefined || value.trim() === '') {
    throw new SdkError('Invalid response: empty <return> element', 'INVALID_RESPONSE');
  }
  return value.trim();
}

/**
 * Extract the `<faultstring>` of a SOAP fault, if the body is one.
 */
export function extractSoapFault(responseXml: string): string | undefined {
  const parsed = parseXml(responseXml);
  if (parsed === undefined) {
    return undefined;
  }
  const fault = findElement(parsed, (name) => name === 'Fault');
  const faultString = textOf(findElement(fault, (name) => name === 'faultstring'));
  return faultString?.trim() || undefined;
}

/**
 * Invoice year embedded in an invoice number (characters 3 to 6).
 *
 * @example
 * invoiceYearOf('WP20260002') // '2026'
 */
export function invoiceYearOf(invoiceNumber: string): string {
  return invoiceNumber.slice(2, 6);
}

/**
 * Interpret the return value of CreateInvoiceV3.
 *
 * @throws ApiError when the vendor returned an error code
 */
export function parseCreateResponse(returnValue: string): CreateInvoiceResponse {
  if (!returnValue.includes(';')) {
    throw new ApiError(returnValue);
  }

  const parts = returnValue.split(';');
  const [invoiceNumber, randomCode] = parts;
  if (parts.length !== 2 || invoiceNumber === undefined || randomCode === undefined) {
    throw new ApiError(returnValue, 'Unexpected response format');
  }

  return {
    invoiceNumber,
    randomCode,
    invoiceYear: invoiceYearOf(invoiceNumber),
  };
}

/**
 * Interpret the return value of CancelInvoice / CancelInvoiceNoCheck.
 * Never throws: a non-`C0` code is reported as `success: false`.
 */
export function parseCancelResponse(returnValue: string): CancelInvoiceResponse {
  if (returnValue === CANCEL_SUCCESS_CODE) {
    return { success: true, code: returnValue };
  }
  return { success: false, code: returnValue, message: returnValue };
}

type QueryTextField = Exclude<
  {
    [K in keyof QueryInvoiceResponse]-?: QueryInvoiceResponse[K] extends string | undefined ? K : never;
  }[keyof QueryInvoiceResponse],
  'invoiceNumber' | 'rawXml'
>;

type QueryAmountField = 'salesAmount' | 'taxAmount' | 'totalAmount';

/**
 * Element names of the queried invoice document, matched case-insensitively
 */
const QUERY_TEXT_FIELDS: readonly (readonly [QueryTextField, string])[] = [
  ['invoiceDate', 'InvoiceDate'],
  ['invoiceTime', 'InvoiceTime'],
  ['orderId', 'OrderID'],
  ['randomCode', 'RandomNumber'],
  ['buyerIdentifier', 'BuyerIdentifier'],
  ['buyerName', 'BuyerName'],
  ['sellerIdentifier', 'SellerIdentifier'],
  ['sellerName', 'SellerName'],
  ['invoiceStatus', 'InvoiceStatus'],
  ['donateMark', 'DonateMark'],
  ['carrierType', 'CarrierType'],
  ['carrierId', 'CarrierId1'],
  ['npoban', 'NPOBAN'],
  ['taxType', 'TaxType'],
];

const QUERY_AMOUNT_FIELDS: readonly (readonly [QueryAmountField, string])[] = [
  ['salesAmount', 'SalesAmount'],
  ['taxAmount', 'TaxAmount'],
  ['totalAmount', 'TotalAmount'],
];

function findText(doc: unknown, tag: string): string | undefined {
  const lowerTag = tag.toLowerCase();
  const value = textOf(findElement(doc, (name) => name.toLowerCase() === lowerTag));
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function findNumber(doc: unknown, tag: string): number | undefined {
  const value = findText(doc, tag);
  if (value === undefined) {
    return undefined;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : undefined;
}

/**
 * Interpret the return value of QueryInvoice.
 *
 * `rawXml` is always the full decoded payload. Fields the document does
 * not contain, or a document that does not parse, leave the
 * corresponding properties undefined.
 *
 * @throws ApiError when the vendor returned an error code instead of XML
 */
export function parseQueryResponse(returnValue: string, invoiceNumber: string): QueryInvoiceResponse {
  if (!returnValue.startsWith('<')) {
    throw new ApiError(returnValue);
  }

  const rawXml = returnValue;
  const doc = parseXml(rawXml);
  if (doc === undefined) {
    return { invoiceNumber, rawXml };
  }

  const textFields: { [K in QueryTextField]?: string } = {};
  for (const [field, tag] of QUERY_TEXT_FIELDS) {
    const value = findText(doc, tag);
    if (value !== undefined) textFields[field] = value;
  }

  const amountFields: { [K in QueryAmountField]?: number } = {};
  for (const [field, tag] of QUERY_AMOUNT_FIELDS) {
    const value = findNumber(doc, tag);
    if (value !== undefined) amountFields[field] = value;
  }

  return { invoiceNumber, ...textFields, ...amountFields, rawXml };
}
