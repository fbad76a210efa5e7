/**
 * iDEAL Request Builder
 *
 * A request goes through three steps: its fields are populated and
 * validated, it is signed, and the signed document is serialized. Only a
 * SignedRequest is handed to the transport.
 */

import { PurchaseOptions, RequestKind } from '../types';
import { WhitespacePolicy } from './acquirers';
import type { MerchantIdentity } from './config';
import {
  AUTHENTICATION_TYPE,
  CURRENCY,
  DSIG_NAMESPACE,
  LANGUAGE,
  ProtocolVersion,
  SignatureMode,
  createdAtTimestamp,
} from './protocol';
import { appendEnvelopedSignature, fingerprint, token, tokenCode } from './signer';
import { requireOptions, statusOptionsSchema, validatePurchase } from './validation';
import { XmlElement, buildXmlDocument, parseXmlDocument, serializeXmlDocument } from './xmlUtils';

/**
 * Validated request content, not yet signed
 */
export type RequestFields =
  | { kind: 'directory'; createdAt: string }
  | { kind: 'transaction'; createdAt: string; amount: number; purchase: PurchaseOptions }
  | { kind: 'status'; createdAt: string; transactionId: string };

/**
 * What the builder needs from the gateway configuration
 */
export interface SigningContext {
  protocol: ProtocolVersion;
  merchant: MerchantIdentity;
  whitespacePolicy: WhitespacePolicy;
}

/**
 * A signed and serialized request document
 */
export interface SignedRequest {
  readonly kind: RequestKind;
  readonly createdAt: string;
  readonly signatureMode: SignatureMode;
  /** The tokenCode (1.1.0) or SignatureValue (3.3.1) embedded in the body. */
  readonly signature: string;
  readonly body: string;
}

export function populateDirectoryFields(now: Date = new Date()): RequestFields {
  return { kind: 'directory', createdAt: createdAtTimestamp(now) };
}

export function populateTransactionFields(amount: number, options: unknown, now: Date = new Date()): RequestFields {
  const purchase = validatePurchase(amount, options);
  return { kind: 'transaction', createdAt: createdAtTimestamp(now), amount, purchase };
}

export function populateStatusFields(options: unknown, now: Date = new Date()): RequestFields {
  const { transactionId } = requireOptions(statusOptionsSchema, options);
  return { kind: 'status', createdAt: createdAtTimestamp(now), transactionId };
}

/**
 * The concatenated fields a legacy tokenCode is computed over. The order is
 * fixed by the protocol.
 */
export function tokenMessage(fields: RequestFields, context: SigningContext): string {
  const { merchantId, subId } = context.merchant;

  switch (fields.kind) {
    case 'directory':
      return `${fields.createdAt}${merchantId}${subId}`;
    case 'status':
      return `${fields.createdAt}${merchantId}${subId}${fields.transactionId}`;
    case 'transaction':
      return [
        fields.createdAt,
        fields.purchase.issuerId,
        merchantId,
        String(subId),
        fields.purchase.returnUrl,
        fields.purchase.orderId,
        context.protocol.formatAmount(fields.amount),
        CURRENCY,
        LANGUAGE,
        fields.purchase.description,
        fields.purchase.entranceCode,
      ].join('');
  }
}

function merchantElement(fields: RequestFields, context: SigningContext, legacyTokenCode?: string): XmlElement {
  const { merchant, protocol } = context;
  const { tags } = protocol;

  const element: XmlElement = {
    [tags.merchantId]: merchant.merchantId,
    [tags.subId]: String(merchant.subId),
  };

  if (legacyTokenCode !== undefined) {
    element[tags.authentication] = AUTHENTICATION_TYPE;
    element[tags.token] = token(merchant.certificate);
    element[tags.tokenCode] = legacyTokenCode;
  }

  if (fields.kind === 'transaction') {
    element[tags.returnUrl] = fields.purchase.returnUrl;
  }

  return element;
}

function documentContent(fields: RequestFields, context: SigningContext, merchant: XmlElement): XmlElement {
  const { protocol } = context;
  const { tags } = protocol;

  const content: XmlElement = {
    '@_xmlns': protocol.namespace,
    '@_version': protocol.version,
    [tags.createdAt]: fields.createdAt,
  };

  switch (fields.kind) {
    case 'directory':
      content.Merchant = merchant;
      break;
    case 'transaction':
      content.Issuer = { [tags.issuerId]: fields.purchase.issuerId };
      content.Merchant = merchant;
      content.Transaction = {
        [tags.orderId]: fields.purchase.orderId,
        [tags.amount]: protocol.formatAmount(fields.amount),
        [tags.currency]: CURRENCY,
        [tags.expirationPeriod]: fields.purchase.expirationPeriod,
        [tags.language]: LANGUAGE,
        [tags.description]: fields.purchase.description,
        [tags.entranceCode]: fields.purchase.entranceCode,
      };
      break;
    case 'status':
      content.Merchant = merchant;
      content.Transaction = { [tags.transactionId]: fields.transactionId };
      break;
  }

  return content;
}

/**
 * Sign populated fields and serialize the resulting document
 */
export function signRequest(fields: RequestFields, context: SigningContext): SignedRequest {
  const { protocol, merchant } = context;
  const rootTag = protocol.requestTags[fields.kind];

  if (protocol.signatureMode === 'token') {
    const code = tokenCode(tokenMessage(fields, context), merchant.privateKey, context.whitespacePolicy);
    const body = buildXmlDocument(rootTag, documentContent(fields, context, merchantElement(fields, context, code)));

    return { kind: fields.kind, createdAt: fields.createdAt, signatureMode: 'token', signature: code, body };
  }

  const unsigned = buildXmlDocument(rootTag, documentContent(fields, context, merchantElement(fields, context)));
  const document = parseXmlDocument(unsigned);
  const signature = appendEnvelopedSignature(document, merchant.privateKey, fingerprint(merchant.certificate));
  const signatureValue = signature.getElementsByTagNameNS(DSIG_NAMESPACE, 'SignatureValue').item(0)?.textContent ?? '';

  return {
    kind: fields.kind,
    createdAt: fields.createdAt,
    signatureMode: 'xmldsig',
    signature: signatureValue,
    body: serializeXmlDocument(document),
  };
}

export function buildDirectoryRequest(context: SigningContext, now?: Date): SignedRequest {
  return signRequest(populateDirectoryFields(now), context);
}

export function buildTransactionRequest(
  amount: number,
  options: Partial<PurchaseOptions>,
  context: SigningContext,
  now?: Date
): SignedRequest {
  return signRequest(populateTransactionFields(amount, options, now), context);
}

export function buildStatusRequest(
  options: { transactionId?: string },
  context: SigningContext,
  now?: Date
): SignedRequest {
  return signRequest(populateStatusFields(options, now), context);
}
