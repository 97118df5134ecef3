export { HTTP_POLICY, POLICIES, SSH_POLICY } from "./policy.js";
export type { ProtocolPolicy } from "./policy.js";
export { Transport, createTransports } from "./transport.js";
export type { FetchOutcome, PullOutcome, PushOptions, PushOutcome } from "./transport.js";
