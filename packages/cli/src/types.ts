/**
 * Tally CLI - Core Types
 */

export interface CliOptions {
    workspace?: string;
    help: boolean;
    version: boolean;
}

export interface Workspace {
    root: string;
    configPath: string;
    ledgerPath: string;
}
