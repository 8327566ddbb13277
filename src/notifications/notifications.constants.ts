export const EMAIL_OPTIONS = Symbol('EMAIL_OPTIONS');
