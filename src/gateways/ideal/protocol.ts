/**
 * iDEAL protocol versions
 *
 * Each version is described by a static table: namespace, signature mode,
 * wire tag names and amount rendering. The gateway selects one at
 * configuration time.
 */

import type { RequestKind } from '../types';

export type ProtocolVersionName = '1.1.0' | '3.3.1';

/**
 * `token`: SHA1_RSA tokenCode over concatenated fields (1.1.0).
 * `xmldsig`: enveloped XML signature, exclusive C14N, RSA-SHA256 (3.3.1).
 */
export type SignatureMode = 'token' | 'xmldsig';

export type WireField =
  | 'createdAt'
  | 'issuerId'
  | 'merchantId'
  | 'subId'
  | 'authentication'
  | 'token'
  | 'tokenCode'
  | 'returnUrl'
  | 'orderId'
  | 'amount'
  | 'currency'
  | 'expirationPeriod'
  | 'language'
  | 'description'
  | 'entranceCode'
  | 'transactionId';

export interface ProtocolVersion {
  readonly version: ProtocolVersionName;
  readonly namespace: string;
  readonly signatureMode: SignatureMode;
  readonly requestTags: Readonly<Record<RequestKind, string>>;
  readonly tags: Readonly<Record<WireField, string>>;
  formatAmount(amountInCents: number): string;
}

export const LANGUAGE = 'nl';
export const CURRENCY = 'EUR';
export const AUTHENTICATION_TYPE = 'SHA1_RSA';
export const XML_DECLARATION = '<?xml version="1.0" encoding="UTF-8"?>';

export const DSIG_NAMESPACE = 'http://www.w3.org/2000/09/xmldsig#';
export const EXCLUSIVE_C14N = 'http://www.w3.org/2001/10/xml-exc-c14n#';
export const ENVELOPED_SIGNATURE = 'http://www.w3.org/2000/09/xmldsig#enveloped-signature';
export const RSA_SHA256 = 'http://www.w3.org/2001/04/xmldsig-more#rsa-sha256';
export const SHA256_DIGEST = 'http://www.w3.org/2001/04/xmlenc#sha256';

const REQUEST_TAGS: Record<RequestKind, string> = {
  directory: 'DirectoryReq',
  transaction: 'AcquirerTrxReq',
  status: 'AcquirerStatusReq',
};

const FIELD_TAGS: Omit<Record<WireField, string>, 'createdAt'> = {
  issuerId: 'issuerID',
  merchantId: 'merchantID',
  subId: 'subID',
  authentication: 'authentication',
  token: 'token',
  tokenCode: 'tokenCode',
  returnUrl: 'merchantReturnURL',
  orderId: 'purchaseID',
  amount: 'amount',
  currency: 'currency',
  expirationPeriod: 'expirationPeriod',
  language: 'language',
  description: 'description',
  entranceCode: 'entranceCode',
  transactionId: 'transactionID',
};

export const PROTOCOLS: Readonly<Record<ProtocolVersionName, ProtocolVersion>> = {
  '1.1.0': {
    version: '1.1.0',
    namespace: 'http://www.idealdesk.com/Message',
    signatureMode: 'token',
    requestTags: REQUEST_TAGS,
    tags: { ...FIELD_TAGS, createdAt: 'createDateTimeStamp' },
    // Whole euro cents
    formatAmount: (amountInCents) => String(amountInCents),
  },
  '3.3.1': {
    version: '3.3.1',
    namespace: 'http://www.idealdesk.com/ideal/messages/mer-acq/3.3.1',
    signatureMode: 'xmldsig',
    requestTags: REQUEST_TAGS,
    tags: { ...FIELD_TAGS, createdAt: 'createDateTimestamp' },
    // Decimal euros, e.g. 4321 -> "43.21"
    formatAmount: (amountInCents) => (amountInCents / 100).toFixed(2),
  },
};

export function isProtocolVersionName(value: string): value is ProtocolVersionName {
  return value === '1.1.0' || value === '3.3.1';
}

export function getProtocol(version: ProtocolVersionName): ProtocolVersion {
  return PROTOCOLS[version];
}

/**
 * Current UTC time in the iDEAL timestamp format. Milliseconds are always zero.
 */
export function createdAtTimestamp(now: Date = new Date()): string {
  return now.toISOString().replace(/\.\d{3}Z$/, '.000Z');
}
