import { DelayPolicy, delayFor, parseRegisteredUsersOnline } from '../src/activity';

describe('parseRegisteredUsersOnline', () => {
  test('reads the online-stats block', () => {
    const html = '<div class="online-stats">  9876 <strong>registered</strong>, 120 guests </div>';
    expect(parseRegisteredUsersOnline(html)).toBe(9876);
  });

  test('falls back to the classic theme footer', () => {
    const html =
      '<center><div><span title="Measured in the last 900 seconds">Users online</span></div>' +
      '<p>— 15000 registered, 2000 guests</p></center>';
    expect(parseRegisteredUsersOnline(html)).toBe(15000);
  });

  test('returns null when there is no footer', () => {
    expect(parseRegisteredUsersOnline('<html><body><p>42 registered</p></body></html>')).toBeNull();
  });

  test('returns null when the footer has no figure', () => {
    expect(parseRegisteredUsersOnline('<div class="online-stats">maintenance</div>')).toBeNull();
  });
});

describe('delayFor', () => {
  const policy: DelayPolicy = { throttle: true, highLoadThreshold: 10_000, highLoadDelayMs: 300_000, defaultDelayMs: 1_000 };

  test('long cooldown only above the threshold', () => {
    expect(delayFor(10_001, policy)).toBe(300_000);
    expect(delayFor(10_000, policy)).toBe(1_000);
    expect(delayFor(0, policy)).toBe(1_000);
  });

  test('without throttling the short delay always applies', () => {
    expect(delayFor(50_000, { ...policy, throttle: false })).toBe(1_000);
  });
});
