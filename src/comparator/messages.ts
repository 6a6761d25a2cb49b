import type { MessageCatalog } from './types';

export const defaultMessages: MessageCatalog = {
  typeMismatch: (property, currentType, desiredType) =>
    `Property '${property}' has type ${currentType}, expected ${desiredType}.`,
  valueMatch: (property, current, desired) =>
    `Property '${property}' is in the desired state: current ${current}, desired ${desired}.`,
  valueNoMatch: (property, current, desired) =>
    `Property '${property}' is not in the desired state: current ${current}, desired ${desired}.`,
  credentialMatch: (property, userName) =>
    `Property '${property}' has the desired user name '${userName}'.`,
  credentialNoMatch: (property, currentUserName, desiredUserName) =>
    currentUserName === undefined
      ? `Property '${property}' has no user name, expected '${desiredUserName}'.`
      : `Property '${property}' has user name '${currentUserName}', expected '${desiredUserName}'.`,
  arrayLengthMismatch: (property, currentLength, desiredLength) =>
    `Property '${property}' has ${currentLength} element(s), expected ${desiredLength}.`,
  arrayElementMismatch: (property, index, current, desired) =>
    `Property '${property}' differs at index ${index}: current ${current}, desired ${desired}.`,
  keyAbsent: property =>
    `Property '${property}' is not part of the desired state and is not compared.`,
  reversePass: () => 'Comparing again with current and desired state swapped.'
};
