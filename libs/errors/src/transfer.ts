import { ProtocolError, ErrorCode, ErrorDetails } from './base';

export class TransferError extends ProtocolError {
  constructor(
    code: ErrorCode,
    message: string,
    public readonly owner: string,
    details?: ErrorDetails
  ) {
    super(code, message, { owner, ...details });
  }
}

export class InvalidSignatureError extends TransferError {
  constructor(owner: string, recovered?: string) {
    super(
      ErrorCode.INVALID_SIGNATURE,
      `Permit signature is not from ${owner}`,
      owner,
      { recovered }
    );
  }
}

export class SignatureExpiredError extends TransferError {
  constructor(owner: string, deadline: bigint, now: bigint) {
    super(
      ErrorCode.SIGNATURE_EXPIRED,
      `Permit from ${owner} expired at ${deadline}`,
      owner,
      { deadline: deadline.toString(), now: now.toString() }
    );
  }
}

export class InvalidNonceError extends TransferError {
  constructor(owner: string, nonce: bigint) {
    super(
      ErrorCode.INVALID_NONCE,
      `Nonce ${nonce} of ${owner} was already used`,
      owner,
      { nonce: nonce.toString() }
    );
  }
}

export class InsufficientBalanceError extends TransferError {
  constructor(owner: string, token: string, balance: bigint, amount: bigint) {
    super(
      ErrorCode.INSUFFICIENT_BALANCE,
      `${owner} holds ${balance} of ${token}, needs ${amount}`,
      owner,
      { token, balance: balance.toString(), amount: amount.toString() }
    );
  }
}

export class InsufficientAllowanceError extends TransferError {
  constructor(owner: string, spender: string, token: string, allowance: bigint, amount: bigint) {
    super(
      ErrorCode.INSUFFICIENT_ALLOWANCE,
      `${spender} may spend ${allowance} of ${owner}'s ${token}, needs ${amount}`,
      owner,
      { spender, token, allowance: allowance.toString(), amount: amount.toString() }
    );
  }
}

export class PermitAmountExceededError extends TransferError {
  constructor(owner: string, permitted: bigint, requested: bigint) {
    super(
      ErrorCode.PERMIT_AMOUNT_EXCEEDED,
      `Requested ${requested} exceeds the permitted ${permitted}`,
      owner,
      { permitted: permitted.toString(), requested: requested.toString() }
    );
  }
}
