import { AppError, ErrorCodes, ServiceUnavailableError, ValidationError } from '@errors';

import { NETWORKS } from './networks';

/**
* A requested network is not in the supported set
*/
export class InvalidNetworkError extends ValidationError {
  readonly invalidNetworks: readonly string[];

  constructor(invalidNetworks: readonly string[]) {
  super(
    `Unsupported networks: ${invalidNetworks.join(', ')}. Valid networks: ${NETWORKS.join(', ')}`,
    { invalid: invalidNetworks, valid: NETWORKS },
    ErrorCodes.INVALID_NETWORK
  );
  this.invalidNetworks = invalidNetworks;
  }
}

/**
* A state machine rejected a transition
*/
export class InvalidTransitionError extends AppError {
  constructor(entity: string, from: string, to: string, allowed: readonly string[]) {
  super(
    `Invalid state transition: cannot transition ${entity} from '${from}' to '${to}'. ` +
    `Valid transitions from '${from}' are: ${allowed.join(', ') || 'none'}`,
    ErrorCodes.INVALID_STATE_TRANSITION,
    409
  );
  }
}

/**
* Enqueue failed during dispatch; the attempt was rolled back before this was raised
*/
export class DispatchError extends ServiceUnavailableError {
  constructor(attemptId: string, cause?: Error) {
  super(
    `Failed to enqueue publication ${attemptId}`,
    ErrorCodes.DISPATCH_FAILED,
    cause ? { cause } : undefined
  );
  }
}
