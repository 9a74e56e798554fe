import { AlertBudgetService } from '../../services/alert-budget.service';
import { createMockLogger } from '../helpers/test-data.helper';

describe('AlertBudgetService', () => {
  let budget: AlertBudgetService;

  beforeEach(() => {
    budget = new AlertBudgetService(3, createMockLogger());
  });

  it('should allow alerts up to the daily cap', () => {
    expect(budget.tryConsume('2024-01-15')).toBe(true);
    expect(budget.tryConsume('2024-01-15')).toBe(true);
    expect(budget.tryConsume('2024-01-15')).toBe(true);
    expect(budget.tryConsume('2024-01-15')).toBe(false);
    expect(budget.snapshot()).toEqual({ count: 3, date: '2024-01-15' });
  });

  it('should reset the count on a new date', () => {
    budget.tryConsume('2024-01-15');
    budget.tryConsume('2024-01-15');
    budget.tryConsume('2024-01-15');

    expect(budget.tryConsume('2024-01-16')).toBe(true);
    expect(budget.snapshot()).toEqual({ count: 1, date: '2024-01-16' });
  });

  it('should report the remaining alerts for a date', () => {
    expect(budget.snapshot()).toEqual({ count: 0, date: null });
    expect(budget.remaining('2024-01-15')).toBe(3);

    budget.tryConsume('2024-01-15');

    expect(budget.remaining('2024-01-15')).toBe(2);
    expect(budget.remaining('2024-01-16')).toBe(3);
  });

  it('should never exceed a cap of one', () => {
    const single = new AlertBudgetService(1, createMockLogger());

    expect(single.tryConsume('2024-01-15')).toBe(true);
    expect(single.tryConsume('2024-01-15')).toBe(false);
    expect(single.tryConsume('2024-01-15')).toBe(false);
    expect(single.snapshot().count).toBe(1);
  });
});
