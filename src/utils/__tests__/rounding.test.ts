import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { roundTo } from '../rounding';

describe('roundTo', () => {
    it('rounds exact ties to the even neighbour', () => {
        assert.equal(roundTo(4.25, 1), 4.2);
        assert.equal(roundTo(4.75, 1), 4.8);
        assert.equal(roundTo(0.5, 0), 0);
        assert.equal(roundTo(1.5, 0), 2);
        assert.equal(roundTo(-4.25, 1), -4.2);
    });

    it('rounds everything else to the nearest value', () => {
        assert.equal(roundTo(4.26, 1), 4.3);
        assert.equal(roundTo(2 / 3, 3), 0.667);
        assert.equal(roundTo(0.0666, 2), 0.07);
        assert.equal(roundTo(175.25, 2), 175.25);
    });
});
