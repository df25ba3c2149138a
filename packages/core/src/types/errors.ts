/**
 * meshid: Error codes and typed error classes.
 */

/** All meshid error codes organized by domain. */
export enum IdentityErrorCode {
  // Identity (1xxx)
  DID_NOT_FOUND = "MESHID-1001",
  DID_REVOKED = "MESHID-1002",
  INVALID_DID_FORMAT = "MESHID-1004",
  DID_ALREADY_EXISTS = "MESHID-1005",
  PRIVATE_KEY_NOT_FOUND = "MESHID-1006",

  // Authentication (2xxx)
  LINK_PROOF_INVALID = "MESHID-2001",
  NONCE_REUSED = "MESHID-2002",
  TIMESTAMP_EXPIRED = "MESHID-2003",
  UNAUTHORIZED = "MESHID-2004",
  FORBIDDEN = "MESHID-2005",

  // Clusters (3xxx)
  CLUSTER_NOT_FOUND = "MESHID-3001",

  // System (9xxx)
  RATE_LIMIT_EXCEEDED = "MESHID-9001",
  INTERNAL_ERROR = "MESHID-9002",
  SNAPSHOT_INVALID = "MESHID-9003",
  VALIDATION_FAILED = "MESHID-9004",
}

/** HTTP status code mapping for error codes. */
const ERROR_HTTP_STATUS: Record<IdentityErrorCode, number> = {
  [IdentityErrorCode.DID_NOT_FOUND]: 404,
  [IdentityErrorCode.DID_REVOKED]: 410,
  [IdentityErrorCode.INVALID_DID_FORMAT]: 400,
  [IdentityErrorCode.DID_ALREADY_EXISTS]: 409,
  [IdentityErrorCode.PRIVATE_KEY_NOT_FOUND]: 404,
  [IdentityErrorCode.LINK_PROOF_INVALID]: 401,
  [IdentityErrorCode.NONCE_REUSED]: 409,
  [IdentityErrorCode.TIMESTAMP_EXPIRED]: 401,
  [IdentityErrorCode.UNAUTHORIZED]: 401,
  [IdentityErrorCode.FORBIDDEN]: 403,
  [IdentityErrorCode.CLUSTER_NOT_FOUND]: 404,
  [IdentityErrorCode.RATE_LIMIT_EXCEEDED]: 429,
  [IdentityErrorCode.INTERNAL_ERROR]: 500,
  [IdentityErrorCode.SNAPSHOT_INVALID]: 422,
  [IdentityErrorCode.VALIDATION_FAILED]: 400,
};

/** Typed error for meshid operations. */
export class IdentityError extends Error {
  /** Machine-readable error code. */
  public readonly code: IdentityErrorCode;
  /** HTTP status code for API responses. */
  public readonly httpStatus: number;
  /** Additional error context. */
  public readonly details: Record<string, unknown>;

  constructor(
    code: IdentityErrorCode,
    message: string,
    details: Record<string, unknown> = {},
  ) {
    super(message);
    this.name = "IdentityError";
    this.code = code;
    this.httpStatus = ERROR_HTTP_STATUS[code];
    this.details = details;

    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class DIDNotFoundError extends IdentityError {
  constructor(did: string) {
    super(IdentityErrorCode.DID_NOT_FOUND, `DID not found: ${did}`, { did });
    this.name = "DIDNotFoundError";
  }
}

export class DIDAlreadyExistsError extends IdentityError {
  constructor(did: string) {
    super(IdentityErrorCode.DID_ALREADY_EXISTS, `DID already exists: ${did}`, { did });
    this.name = "DIDAlreadyExistsError";
  }
}

/** The local key directory holds no usable key for a DID. */
export class PrivateKeyNotFoundError extends IdentityError {
  constructor(did: string, details: Record<string, unknown> = {}) {
    super(IdentityErrorCode.PRIVATE_KEY_NOT_FOUND, `No private key available for ${did}`, {
      did,
      ...details,
    });
    this.name = "PrivateKeyNotFoundError";
  }
}

export class DIDRevokedError extends IdentityError {
  constructor(did: string) {
    super(IdentityErrorCode.DID_REVOKED, `DID has been revoked: ${did}`, { did });
    this.name = "DIDRevokedError";
  }
}

/** A node points at a cluster the store does not hold. Indicates a store bug. */
export class ClusterNotFoundError extends IdentityError {
  constructor(clusterId: string) {
    super(
      IdentityErrorCode.CLUSTER_NOT_FOUND,
      `Identity cluster not found: ${clusterId}`,
      { cluster_id: clusterId },
    );
    this.name = "ClusterNotFoundError";
  }
}

export class LinkProofInvalidError extends IdentityError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super(IdentityErrorCode.LINK_PROOF_INVALID, message, details);
    this.name = "LinkProofInvalidError";
  }
}

export class InvalidDIDFormatError extends IdentityError {
  constructor(message: string, did: string) {
    super(IdentityErrorCode.INVALID_DID_FORMAT, message, { did });
    this.name = "InvalidDIDFormatError";
  }
}

export class SnapshotInvalidError extends IdentityError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super(IdentityErrorCode.SNAPSHOT_INVALID, message, details);
    this.name = "SnapshotInvalidError";
  }
}
