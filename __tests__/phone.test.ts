import { normalizeKenyanMsisdn } from '../src/utils/phone';

describe('normalizeKenyanMsisdn', () => {
  it.each([
    ['0712345678', '254712345678'],
    ['0112345678', '254112345678'],
    ['+254 712 345 678', '254712345678'],
    ['254712-345-678', '254712345678'],
  ])('normalizes %s', (input, expected) => {
    expect(normalizeKenyanMsisdn(input)).toBe(expected);
  });

  it.each(['', '12345', '0812345678', '+255712345678', '07123456789'])('refuses %p', (input) => {
    expect(normalizeKenyanMsisdn(input)).toBeNull();
  });

  it('refuses a missing number', () => {
    expect(normalizeKenyanMsisdn(undefined)).toBeNull();
  });
});
