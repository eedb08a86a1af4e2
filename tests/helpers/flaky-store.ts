import { SqliteAlertStateStore } from '../../src/data/alert-state-store';
import { AlertState } from '../../src/shared/types';

/**
 * In-memory SQLite store whose row writes can be made to fail on demand.
 */
export class FlakyAlertStateStore extends SqliteAlertStateStore {
    failuresRemaining = 0;
    writeAttempts = 0;

    constructor() {
        super(':memory:');
    }

    protected writeRow(stateKey: string, state: AlertState): void {
        this.writeAttempts++;
        if (this.failuresRemaining > 0) {
            this.failuresRemaining--;
            throw new Error('disk I/O error');
        }
        super.writeRow(stateKey, state);
    }
}
