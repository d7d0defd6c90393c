import { isMinimal, judge } from '../src/catalog/policy.js';

describe('Minimality policy', () => {
    test('judge compares against the current minimum', () => {
        expect(judge(3, undefined)).toBe('first');
        expect(judge(1, 1)).toBe('tie');
        expect(judge(0, 1)).toBe('dethrone');
        expect(judge(2, 1)).toBe('lose');
    });

    test('only losing keeps a formula out of the minimal list', () => {
        expect(isMinimal('first')).toBe(true);
        expect(isMinimal('tie')).toBe(true);
        expect(isMinimal('dethrone')).toBe(true);
        expect(isMinimal('lose')).toBe(false);
    });
});
