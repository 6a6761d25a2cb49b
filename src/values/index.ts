export { SecureValue } from './secure-value';
export { Credential } from './credential';
export { Enumeration, type EnumObject } from './enumeration';
export { CodeBlock } from './code-block';
