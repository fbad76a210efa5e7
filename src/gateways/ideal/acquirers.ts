/**
 * iDEAL acquirer endpoints
 */

import { ConfigurationError, Environment, RequestKind } from '../types';
import { ProtocolVersionName } from './protocol';

export type AcquirerName = 'ing' | 'rabobank' | 'abnamro';

/**
 * How whitespace is removed from a legacy tokenCode message.
 * ABN AMRO keeps spaces and only strips control characters.
 */
export type WhitespacePolicy = 'strip-all' | 'strip-control';

/**
 * Either one URL for every message or one per request kind
 */
export type EndpointUrls = string | Readonly<Record<RequestKind, string>>;

export interface AcquirerDefinition {
  live: EndpointUrls;
  test: EndpointUrls;
  whitespacePolicy: WhitespacePolicy;
}

export const ACQUIRER_NAMES: readonly AcquirerName[] = ['ing', 'rabobank', 'abnamro'];

export const ACQUIRERS: Readonly<Record<ProtocolVersionName, Readonly<Record<AcquirerName, AcquirerDefinition>>>> = {
  '1.1.0': {
    ing: {
      live: 'https://ideal.secure-ing.com/ideal/iDeal',
      test: 'https://idealtest.secure-ing.com/ideal/iDeal',
      whitespacePolicy: 'strip-all',
    },
    rabobank: {
      live: 'https://ideal.rabobank.nl/ideal/iDeal',
      test: 'https://idealtest.rabobank.nl/ideal/iDeal',
      whitespacePolicy: 'strip-all',
    },
    abnamro: {
      live: {
        directory: 'https://idealm.abnamro.nl/nl/issuerInformation/getIssuerInformation.xml',
        transaction: 'https://idealm.abnamro.nl/nl/acquirerTrxRegistration/getAcquirerTrxRegistration.xml',
        status: 'https://idealm.abnamro.nl/nl/acquirerStatusInquiry/getAcquirerStatusInquiry.xml',
      },
      test: {
        directory: 'https://itt.idealdesk.com/ITTEmulatorAcquirer/Directory.aspx',
        transaction: 'https://itt.idealdesk.com/ITTEmulatorAcquirer/Transaction.aspx',
        status: 'https://itt.idealdesk.com/ITTEmulatorAcquirer/Status.aspx',
      },
      whitespacePolicy: 'strip-control',
    },
  },
  '3.3.1': {
    ing: {
      live: 'https://ideal.secure-ing.com/ideal/iDeal',
      test: 'https://idealtest.secure-ing.com/ideal/iDeal',
      whitespacePolicy: 'strip-all',
    },
    rabobank: {
      live: 'https://ideal.rabobank.nl/ideal/iDealv3',
      test: 'https://idealtest.rabobank.nl/ideal/iDealv3',
      whitespacePolicy: 'strip-all',
    },
    abnamro: {
      live: 'https://abnamro.ideal-payment.de/ideal/iDeal',
      test: 'https://abnamro-test.ideal-payment.de/ideal/iDeal',
      whitespacePolicy: 'strip-all',
    },
  },
};

export function isAcquirerName(name: string): name is AcquirerName {
  return ACQUIRER_NAMES.some((acquirer) => acquirer === name);
}

/**
 * Normalize a configured acquirer name, rejecting unknown acquirers
 */
export function parseAcquirerName(name: string): AcquirerName {
  const normalized = name.trim().toLowerCase();

  if (!isAcquirerName(normalized)) {
    throw new ConfigurationError(
      `Unknown acquirer \`${name}', please choose one of: ${ACQUIRER_NAMES.join(', ')}`
    );
  }

  return normalized;
}

/**
 * Look up an acquirer by name for the given protocol version
 */
export function resolveAcquirer(name: string, version: ProtocolVersionName): AcquirerDefinition {
  return ACQUIRERS[version][parseAcquirerName(name)];
}

/**
 * Get the URL for a request kind based on the environment
 */
export function resolveEndpoint(
  acquirer: AcquirerDefinition,
  environment: Environment,
  kind: RequestKind
): string {
  const urls = environment === 'test' ? acquirer.test : acquirer.live;
  return typeof urls === 'string' ? urls : urls[kind];
}
