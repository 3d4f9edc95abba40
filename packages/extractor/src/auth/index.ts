export { login, getHiddenInputs } from './login';
export { KeywordAuthVerifier, DEFAULT_SUCCESS_MARKERS } from './verifier';
export type { AuthVerifier } from './verifier';
