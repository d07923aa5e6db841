import config from '../config.js';
import validateString from './string.js';

/**
 * Account names follow the host chain's username rules
 */
export default function validateAccount(value: unknown): value is string {
    return validateString(value, config.accountMaxLength, config.accountMinLength, config.allowedUsernameChars);
}
