import { describe, it, expect } from 'vitest';
import { InboxScheduler } from '../../../src/scheduler/InboxScheduler.js';

describe('InboxScheduler.cronExpressionFor', () => {
  it('should run every N minutes below an hour', () => {
    expect(InboxScheduler.cronExpressionFor(1)).toBe('*/1 * * * *');
    expect(InboxScheduler.cronExpressionFor(15)).toBe('*/15 * * * *');
  });

  it('should fall back to whole hours for longer intervals', () => {
    expect(InboxScheduler.cronExpressionFor(90)).toBe('0 */1 * * *');
    expect(InboxScheduler.cronExpressionFor(120)).toBe('0 */2 * * *');
  });

  it('should run daily for a day or more', () => {
    expect(InboxScheduler.cronExpressionFor(1440)).toBe('0 0 * * *');
    expect(InboxScheduler.cronExpressionFor(4000)).toBe('0 0 * * *');
  });
});
