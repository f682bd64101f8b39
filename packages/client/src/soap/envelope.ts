/**
 * SOAP request building for the Cetustek invoice API.
 *
 * Invoice documents travel as a CDATA-wrapped `invoicexml` string inside
 * the SOAP body; text values are XML-escaped by the builder.
 */

import { XMLBuilder } from 'fast-xml-parser';
import type { CancelInvoiceInput, CreateInvoiceInput, InvoiceItem, SoapAction } from '@einvoice-tw/contracts';
import { DEFAULT_TAX_RATE } from '@einvoice-tw/contracts';
import { fromNumber } from '@einvoice-tw/shared';

export const SOAP_ENVELOPE_NAMESPACE = 'http://schemas.xmlsoap.org/soap/envelope/';
export const CETUSTEK_NAMESPACE = 'http://webservice.cetustek.com/';

/** Schema version of the invoice documents */
export const INVOICE_XSD_VERSION = '2.8';

/** Property name that marks CDATA content for the builder */
export const CDATA_KEY = '__cdata';

const XML_DECLARATION = '<?xml version="1.0" encoding="utf-8"?>';

const documentBuilder = new XMLBuilder({
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  format: true,
  indentBy: '  ',
  suppressEmptyNode: false,
  processEntities: true,
});

// Unformatted, so no whitespace ends up around the CDATA section
const envelopeBuilder = new XMLBuilder({
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  cdataPropName: CDATA_KEY,
  format: false,
  suppressEmptyNode: false,
  processEntities: true,
});

/**
 * Body elements of a SOAP operation, keyed by element name
 */
export type SoapPayload = Record<string, string | { [CDATA_KEY]: string }>;

/**
 * Credential elements every operation carries
 */
export interface SoapCredentials {
  rentid: string;
  source: string;
}

/**
 * Wrap an operation payload in a SOAP 1.1 envelope.
 */
export function buildSoapEnvelope(action: SoapAction, payload: SoapPayload): string {
  const xml: string = envelopeBuilder.build({
    'soap:Envelope': {
      '@_xmlns:soap': SOAP_ENVELOPE_NAMESPACE,
      '@_xmlns:tns': CETUSTEK_NAMESPACE,
      'soap:Body': {
        [`tns:${action}`]: payload,
      },
    },
  });
  return `${XML_DECLARATION}${xml}`;
}

function buildProductItem(item: InvoiceItem): Record<string, string> {
  const productItem: Record<string, string> = {
    ProductionCode: item.productionCode,
    Description: item.description,
    Quantity: fromNumber(item.quantity),
  };
  if (item.unit) {
    productItem['Unit'] = item.unit;
  }
  productItem['UnitPrice'] = fromNumber(item.unitPrice);
  return productItem;
}

/**
 * Build the `<Invoice>` document of a CreateInvoiceV3 call.
 * Absent optional fields are sent as empty elements.
 */
export function buildCreateInvoiceXml(input: CreateInvoiceInput): string {
  const xml: string = documentBuilder.build({
    Invoice: {
      '@_XSDVersion': INVOICE_XSD_VERSION,
      OrderId: input.orderId,
      OrderDate: input.orderDate,
      BuyerIdentifier: input.buyerIdentifier ?? '',
      BuyerName: input.buyerName ?? '',
      BuyerAddress: input.buyerAddress ?? '',
      BuyerEmailAddress: input.buyerEmail ?? '',
      DonateMark: input.donateMark,
      InvoiceType: input.invoiceType,
      CarrierType: input.carrierType ?? '',
      CarrierId1: input.carrierId1 ?? '',
      CarrierId2: input.carrierId2 ?? '',
      NPOBAN: input.npoban ?? '',
      PayWay: input.payWay,
      TaxType: input.taxType,
      TaxRate: fromNumber(input.taxRate ?? DEFAULT_TAX_RATE),
      Remark: input.remark ?? '',
      Details: {
        ProductItem: input.items.map(buildProductItem),
      },
    },
  });
  return xml;
}

/**
 * Build the `<Invoice>` document of a CancelInvoice call.
 */
export function buildCancelInvoiceXml(input: CancelInvoiceInput): string {
  const xml: string = documentBuilder.build({
    Invoice: {
      '@_XSDVersion': INVOICE_XSD_VERSION,
      InvoiceNumber: input.invoiceNumber,
      InvoiceYear: input.invoiceYear,
      ReturnTaxDocumentNumber: input.returnTaxDocumentNumber ?? '',
      Remark: input.remark ?? '',
    },
  });
  return xml;
}

/**
 * Payload carrying an invoice document plus credentials.
 */
export function invoiceDocumentPayload(invoiceXml: string, credentials: SoapCredentials): SoapPayload {
  return {
    invoicexml: { [CDATA_KEY]: invoiceXml },
    rentid: credentials.rentid,
    source: credentials.source,
  };
}
