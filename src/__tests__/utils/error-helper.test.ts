import { extractErrorMessage, extractErrorStack } from '../../utils/error-helper';
import { FeedError, FeedErrorKind } from '../../types';

describe('error-helper', () => {
  describe('extractErrorMessage', () => {
    it('should read messages from errors, strings and message-like objects', () => {
      expect(extractErrorMessage(new Error('boom'))).toBe('boom');
      expect(extractErrorMessage('plain')).toBe('plain');
      expect(extractErrorMessage({ message: 'from object' })).toBe('from object');
      expect(extractErrorMessage({ message: 42 })).toBe('[object Object]');
      expect(extractErrorMessage(undefined)).toBe('undefined');
    });

    it('should include the kind and symbol of a feed error', () => {
      const error = new FeedError(FeedErrorKind.TIMEOUT, 'XAU/USD', 'timed out');

      expect(extractErrorMessage(error)).toBe('[TIMEOUT] XAU/USD: timed out');
      expect(error).toBeInstanceOf(Error);
    });
  });

  describe('extractErrorStack', () => {
    it('should return the stack of Error instances only', () => {
      expect(extractErrorStack(new Error('boom'))).toContain('boom');
      expect(extractErrorStack('boom')).toBeUndefined();
    });
  });
});
