export interface ValidatorLogger {
  warn: (message: string) => void;
}

/**
 * Logger for the validator. Set to null to disable warnings.
 */
export let validatorLogger: ValidatorLogger | null = {
  warn: (message: string) => console.warn(message),
};

/**
 * Set the logger for the validator.
 * Pass null to disable logging.
 */
export function setValidatorLogger(logger: ValidatorLogger | null): void {
  validatorLogger = logger;
}
