import { fromNodeProviderChain } from "@aws-sdk/credential-providers";

/**
 * Client settings for AWS services. Credentials resolve lazily through the
 * default chain: environment variables, shared config files, then instance roles.
 */
export function createAwsConfig(region: string) {
  return {
    region,
    credentials: fromNodeProviderChain(),
  };
}

export default createAwsConfig;
