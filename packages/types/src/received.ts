import { describeReceived } from '@argspec/core';

/** Short rendering of a rejected value for failure reasons */
export function received(value: unknown): string {
  switch (typeof value) {
    case 'number':
    case 'boolean':
      return String(value);
    case 'string':
      return JSON.stringify(value);
    default:
      return describeReceived(value);
  }
}
