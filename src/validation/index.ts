import integer from './integer.js';
import string from './string.js';
import bigint from './bigint.js';
import account from './account.js';

/**
 * Validation module interface
 */
export interface ValidationModule {
    integer: typeof integer;
    string: typeof string;
    bigint: typeof bigint;
    account: typeof account;
}

/**
 * Validation module with functions for validating different data types
 */
const validation: ValidationModule = {
    integer,
    string,
    bigint,
    account,
};

export default validation;
