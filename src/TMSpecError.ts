'use strict';

import * as _ from 'lodash';

export interface TMSpecErrorDetails {
  problemValue?: unknown;
  validationErrors?: string[];
}

/**
 * Raised while compiling a machine definition: an undeclared state,
 * an unknown symbol or move, and so on.
 */
class TMSpecError extends Error {
  public readonly reason: string;
  public readonly details: TMSpecErrorDetails;

  constructor (reason: string, details?: TMSpecErrorDetails) {
    super(describe(reason, details || {}));

    this.name = 'TMSpecError';

    this.reason = reason;
    this.details = details || {};

    // https://github.com/Microsoft/TypeScript-wiki/blob/master/Breaking-Changes.md#extending-built-ins-like-error-array-and-map-may-no-longer-work
    // Set the prototype explicitly.
    Object.setPrototypeOf(this, TMSpecError.prototype);
  }
}

// plain-text description for the console
function describe (reason: string, details: TMSpecErrorDetails): string {
  let problemValue = _.isNil(details.problemValue) ? '' : ' ' + JSON.stringify(details.problemValue);
  let validationErrors = _.isEmpty(details.validationErrors)
    ? ''
    : JSON.stringify(details.validationErrors, null, 4);
  return [reason + problemValue, validationErrors]
    .filter(_.identity)
    .join('\n');
}

export default TMSpecError;
