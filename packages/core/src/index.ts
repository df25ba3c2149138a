/**
 * @meshid/core: multi-device identity graph.
 */

// Types
export type {
  DIDStatus,
  DIDNode,
  CreatedDIDNode,
  IdentityCluster,
  LinkProof,
  LinkProofSubmission,
  DIDDocument,
  DIDDocumentMetadata,
  DIDResolution,
  Ed25519VerificationKey2020,
} from "./types/did.js";
export {
  IdentityError,
  IdentityErrorCode,
  DIDNotFoundError,
  DIDAlreadyExistsError,
  DIDRevokedError,
  ClusterNotFoundError,
  LinkProofInvalidError,
  InvalidDIDFormatError,
  SnapshotInvalidError,
  PrivateKeyNotFoundError,
} from "./types/errors.js";

// Crypto
export {
  generateSigningKeyPair,
  keyPairFromPrivateKey,
  ED25519_KEY_LENGTH,
  type KeyPair,
} from "./crypto/keys.js";
export {
  canonicalize,
  canonicalBytes,
  sign,
  verify,
  verifyBase64Url,
  hashPayload,
  toBase64Url,
  fromBase64Url,
} from "./crypto/signing.js";
export {
  LINK_PROOF_DOMAIN,
  canonicalPair,
  buildLinkPayload,
  signLinkPayload,
  findInvalidSignatures,
} from "./crypto/link-proof.js";
export {
  AUTH_HEADERS,
  requestSigningPayload,
  signRequest,
  type RequestSigningInput,
} from "./crypto/request.js";

// DID
export {
  DEFAULT_DID_METHOD,
  deriveDID,
  parseDID,
  generateDID,
  type GeneratedDID,
} from "./did/generate.js";
export {
  buildDIDDocument,
  encodePublicKeyMultibase,
  decodePublicKeyMultibase,
} from "./did/document.js";
export { isValidTransition, assertActive } from "./did/status.js";

// Identity graph
export {
  DIDManager,
  DEFAULT_MAX_CLOCK_SKEW_MS,
  type DIDManagerOptions,
  type IdentityLogger,
  type LinkOptions,
} from "./identity/manager.js";
export {
  planLink,
  chooseSurvivor,
  unionMembers,
  type LinkOutcome,
  type LinkOutcomeKind,
  type LinkSide,
  type LinkPlanContext,
} from "./identity/cluster.js";
export {
  SNAPSHOT_VERSION,
  parseSnapshot,
  nodeToRecord,
  nodeFromRecord,
  clusterToRecord,
  clusterFromRecord,
  proofToRecord,
  proofFromRecord,
  type NodeRecord,
  type ClusterRecord,
  type ProofRecord,
  type StoreSnapshot,
} from "./identity/serialize.js";

// Storage
export type { DIDStore } from "./store/types.js";
export { InMemoryDIDStore } from "./store/memory.js";
