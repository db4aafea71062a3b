import type { CommandDefinition } from '@tally/core';
import type { BudgetState } from '../budget/state.js';
import { addCommands } from './add.js';
import { deleteCommands } from './delete.js';
import { editCommands } from './edit.js';
import { listCommands } from './list.js';
import { renameCommands } from './rename.js';
import { setCommands } from './set.js';
import { transferCommands } from './transfer.js';

/**
 * Every budget command, in the order help lists them.
 */
export function budgetCommands(): CommandDefinition<BudgetState>[] {
    return [
        ...listCommands(),
        ...addCommands(),
        ...deleteCommands(),
        ...editCommands(),
        ...setCommands(),
        ...renameCommands(),
        ...transferCommands(),
    ];
}
