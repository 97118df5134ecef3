import { CREDENTIAL_KINDS } from "../credentials/types.js";
import { isHttpUrl, isSshUrl } from "../endpoint.js";
import type { CredentialKind, Protocol } from "../types.js";

/**
 * What distinguishes one transport variant from another: which URLs it
 * accepts and which credential kinds it may hand to the engine.
 */
export interface ProtocolPolicy {
  readonly name: Protocol;
  accepts(url: string): boolean;
  readonly credentialKinds: readonly CredentialKind[];
}

export const HTTP_POLICY: ProtocolPolicy = {
  name: "http",
  accepts: isHttpUrl,
  credentialKinds: CREDENTIAL_KINDS.http,
};

export const SSH_POLICY: ProtocolPolicy = {
  name: "ssh",
  accepts: isSshUrl,
  credentialKinds: CREDENTIAL_KINDS.ssh,
};

export const POLICIES: Readonly<Record<Protocol, ProtocolPolicy>> = {
  http: HTTP_POLICY,
  ssh: SSH_POLICY,
};
