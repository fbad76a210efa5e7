import dotenv from 'dotenv';

dotenv.config();

/**
 * Raw iDEAL settings as read from the environment
 */
export interface IdealEnvironmentSettings {
  merchantId?: string;
  subId?: string;
  passphrase?: string;
  privateKeyPath?: string;
  privateCertificatePath?: string;
  bankCertificatePath?: string;
  acquirer?: string;
  environment?: string;
  protocolVersion?: string;
  debug?: boolean;
}

export function readIdealSettings(env: NodeJS.ProcessEnv = process.env): IdealEnvironmentSettings {
  return {
    merchantId: env.IDEAL_MERCHANT_ID,
    subId: env.IDEAL_SUB_ID || undefined,
    passphrase: env.IDEAL_PASSPHRASE || undefined,
    privateKeyPath: env.IDEAL_PRIVATE_KEY_PATH,
    privateCertificatePath: env.IDEAL_PRIVATE_CERTIFICATE_PATH,
    bankCertificatePath: env.IDEAL_BANK_CERTIFICATE_PATH,
    acquirer: env.IDEAL_ACQUIRER || undefined,
    environment: env.IDEAL_ENVIRONMENT || undefined,
    protocolVersion: env.IDEAL_PROTOCOL_VERSION || undefined,
    debug: env.IDEAL_DEBUG === 'true',
  };
}

// Read on access so changes to process.env after import are seen
export const config = {
  get ideal(): IdealEnvironmentSettings {
    return readIdealSettings();
  },
};
