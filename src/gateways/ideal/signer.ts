/**
 * iDEAL Digest and Signature Engine
 *
 * Legacy (1.1.0) messages carry a token and a tokenCode: an RSA-SHA1
 * signature over concatenated fields. Current (3.3.1) messages carry an
 * enveloped XML-DSig signature with exclusive C14N and RSA-SHA256.
 */

import crypto, { KeyObject, X509Certificate } from 'crypto';
import { ConfigurationError } from '../types';
import { WhitespacePolicy } from './acquirers';
import { canonicalize } from './canonicalizer';
import {
  DSIG_NAMESPACE,
  ENVELOPED_SIGNATURE,
  EXCLUSIVE_C14N,
  RSA_SHA256,
  SHA256_DIGEST,
} from './protocol';
import { appendElement } from './xmlUtils';

const XMLNS_NAMESPACE = 'http://www.w3.org/2000/xmlns/';

/**
 * Remove whitespace according to the acquirer's policy
 */
export function stripWhitespace(value: string, policy: WhitespacePolicy = 'strip-all'): string {
  return policy === 'strip-control' ? value.replace(/[\f\n\r\t\v]/g, '') : value.replace(/\s/g, '');
}

/**
 * Throw unless the key can produce RSA signatures
 */
export function assertSigningKey(key: KeyObject | null | undefined): asserts key is KeyObject {
  if (!key) {
    throw new ConfigurationError('No merchant private key configured');
  }
  if (key.type !== 'private' || key.asymmetricKeyType !== 'rsa') {
    throw new ConfigurationError(
      `Merchant key must be an RSA private key, got ${key.asymmetricKeyType ?? 'unknown'} ${key.type} key`
    );
  }
}

function certificateSha1(certificate: X509Certificate): string {
  return crypto.createHash('sha1').update(certificate.raw).digest('hex').toUpperCase();
}

/**
 * Legacy `token`: uppercase hex SHA1 of the merchant certificate (DER)
 */
export function token(certificate: X509Certificate): string {
  return certificateSha1(certificate);
}

/**
 * XML-DSig `KeyName`: same value as the legacy token
 */
export function fingerprint(certificate: X509Certificate): string {
  return certificateSha1(certificate);
}

/**
 * Legacy `tokenCode`: base64 RSA-SHA1 signature over the whitespace-stripped message
 */
export function tokenCode(message: string, key: KeyObject, policy: WhitespacePolicy): string {
  assertSigningKey(key);
  const signature = crypto.sign('sha1', Buffer.from(stripWhitespace(message, policy), 'utf8'), key);
  return stripWhitespace(signature.toString('base64'));
}

/**
 * Base64 SHA-256 digest of the canonical document, leaving out the signature
 */
export function digestValue(document: Document, signature: Element | null = null): string {
  const canonical = canonicalize(document, { exclude: signature });
  return stripWhitespace(crypto.createHash('sha256').update(canonical, 'utf8').digest('base64'));
}

/**
 * Base64 RSA-SHA256 signature over the canonical SignedInfo element
 */
export function signatureValue(signedInfo: Element, key: KeyObject): string {
  assertSigningKey(key);
  const canonical = canonicalize(signedInfo);
  return stripWhitespace(crypto.sign('sha256', Buffer.from(canonical, 'utf8'), key).toString('base64'));
}

/**
 * Sign a document in place by appending an enveloped Signature element as
 * the last child of the document element.
 */
export function appendEnvelopedSignature(document: Document, key: KeyObject, keyName: string): Element {
  assertSigningKey(key);

  const root = document.documentElement;
  const signature = document.createElementNS(DSIG_NAMESPACE, 'Signature');
  signature.setAttributeNS(XMLNS_NAMESPACE, 'xmlns', DSIG_NAMESPACE);
  root.appendChild(signature);

  const signedInfo = appendElement(signature, 'SignedInfo');
  appendElement(signedInfo, 'CanonicalizationMethod').setAttribute('Algorithm', EXCLUSIVE_C14N);
  appendElement(signedInfo, 'SignatureMethod').setAttribute('Algorithm', RSA_SHA256);

  const reference = appendElement(signedInfo, 'Reference');
  reference.setAttribute('URI', '');
  const transforms = appendElement(reference, 'Transforms');
  appendElement(transforms, 'Transform').setAttribute('Algorithm', ENVELOPED_SIGNATURE);
  appendElement(reference, 'DigestMethod').setAttribute('Algorithm', SHA256_DIGEST);
  appendElement(reference, 'DigestValue', digestValue(document, signature));

  appendElement(signature, 'SignatureValue', signatureValue(signedInfo, key));
  const keyInfo = appendElement(signature, 'KeyInfo');
  appendElement(keyInfo, 'KeyName', keyName);

  return signature;
}
