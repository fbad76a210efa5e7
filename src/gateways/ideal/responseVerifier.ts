/**
 * iDEAL Response Verifier
 *
 * Checks that a response was signed by the acquirer. Verification never
 * throws: any failure, including malformed input, reports `false` and is
 * logged.
 */

import crypto, { X509Certificate } from 'crypto';
import { canonicalize } from './canonicalizer';
import {
  DSIG_NAMESPACE,
  ENVELOPED_SIGNATURE,
  EXCLUSIVE_C14N,
  RSA_SHA256,
  SHA256_DIGEST,
} from './protocol';
import { digestValue, stripWhitespace } from './signer';
import { parseXmlDocument } from './xmlUtils';

const ALLOWED_TRANSFORMS = new Set([ENVELOPED_SIGNATURE, EXCLUSIVE_C14N]);

/**
 * Fields covered by a legacy status response signature
 */
export interface LegacySignedFields {
  createdAt?: string;
  transactionId?: string;
  status?: string;
  consumerAccountNumber?: string;
  signatureValue?: string;
}

function logFailure(reason: string): void {
  console.warn(`[IdealVerifier] Response signature rejected: ${reason}`);
}

function firstChild(parent: Element, localName: string): Element | undefined {
  return parent.getElementsByTagNameNS(DSIG_NAMESPACE, localName).item(0) ?? undefined;
}

function algorithmOf(parent: Element, localName: string): string | undefined {
  return firstChild(parent, localName)?.getAttribute('Algorithm') ?? undefined;
}

/**
 * Verify a legacy (1.1.0) status response: RSA-SHA1 over
 * createDateTimeStamp + transactionID + status + consumerAccountNumber
 */
export function verifyLegacySignature(fields: LegacySignedFields, bankCertificate: X509Certificate): boolean {
  if (!fields.signatureValue) {
    logFailure('no signatureValue');
    return false;
  }

  try {
    const message = [fields.createdAt, fields.transactionId, fields.status, fields.consumerAccountNumber]
      .map((value) => value ?? '')
      .join('');

    const valid = crypto.verify(
      'sha1',
      Buffer.from(message, 'utf8'),
      bankCertificate.publicKey,
      Buffer.from(stripWhitespace(fields.signatureValue), 'base64')
    );

    if (!valid) {
      logFailure('signatureValue does not match');
    }
    return valid;
  } catch (error) {
    logFailure(error instanceof Error ? error.message : 'Unknown error');
    return false;
  }
}

function checkEnvelopedSignature(document: Document, bankCertificate: X509Certificate): string | null {
  const signature = firstChild(document.documentElement, 'Signature');
  if (!signature) return 'no Signature element';

  const signedInfo = firstChild(signature, 'SignedInfo');
  if (!signedInfo) return 'no SignedInfo element';

  if (algorithmOf(signedInfo, 'CanonicalizationMethod') !== EXCLUSIVE_C14N) {
    return 'unsupported canonicalization method';
  }
  if (algorithmOf(signedInfo, 'SignatureMethod') !== RSA_SHA256) {
    return 'unsupported signature method';
  }

  const references = signedInfo.getElementsByTagNameNS(DSIG_NAMESPACE, 'Reference');
  const reference = references.item(0);
  if (references.length !== 1 || !reference) return 'expected exactly one Reference';
  if (reference.getAttribute('URI') !== '') return 'Reference must cover the whole document';

  const transforms = Array.from(reference.getElementsByTagNameNS(DSIG_NAMESPACE, 'Transform'));
  if (transforms.some((transform) => !ALLOWED_TRANSFORMS.has(transform.getAttribute('Algorithm') ?? ''))) {
    return 'unsupported transform';
  }
  if (algorithmOf(reference, 'DigestMethod') !== SHA256_DIGEST) {
    return 'unsupported digest method';
  }

  const expectedDigest = stripWhitespace(firstChild(reference, 'DigestValue')?.textContent ?? '');
  if (digestValue(document, signature) !== expectedDigest) {
    return 'digest does not match';
  }

  const signatureValue = stripWhitespace(firstChild(signature, 'SignatureValue')?.textContent ?? '');
  if (!signatureValue) return 'no SignatureValue';

  const valid = crypto.verify(
    'sha256',
    Buffer.from(canonicalize(signedInfo), 'utf8'),
    bankCertificate.publicKey,
    Buffer.from(signatureValue, 'base64')
  );

  return valid ? null : 'SignatureValue does not match';
}

/**
 * Verify the enveloped XML-DSig signature of a (3.3.1) response body
 */
export function verifyEnvelopedSignature(xml: string, bankCertificate: X509Certificate): boolean {
  try {
    const failure = checkEnvelopedSignature(parseXmlDocument(xml), bankCertificate);
    if (failure) {
      logFailure(failure);
      return false;
    }
    return true;
  } catch (error) {
    logFailure(error instanceof Error ? error.message : 'Unknown error');
    return false;
  }
}
