// Errors
export {
    CommandError,
    ValidationError,
    RoutingError,
    AbortError,
    UnsupportedOperationError,
    DisplayError,
    CommandConfigError,
    QuitSignal,
} from './errors.js';
export type { RoutingFailure } from './errors.js';

// Tokens
export { splitArgs } from './tokens/split.js';
export { TokenList } from './tokens/token-list.js';
export type { PendingToken } from './tokens/token-list.js';

// Validators
export { Validator, TextValidator, bindParam, ok, fail } from './validator/validator.js';
export type { Validation, MatchOptions, ParamOptions } from './validator/validator.js';
export {
    LiteralValidator,
    PredicateValidator,
    AnyValidator,
    CommentValidator,
    ShortcutNameValidator,
    IntegerValidator,
    isDigits,
} from './validator/builtin.js';
export type { LiteralSource } from './validator/builtin.js';

// Commands
export { Command, ReversibleCommand, isReversible, defineCommand } from './command/command.js';
export type {
    Interaction,
    Session,
    CommandInput,
    CommandClass,
    CommandDefinition,
    LeafDefinition,
    ForkDefinition,
    ContextualDefinition,
    ProbeDefinition,
    ProbeBranch,
    Example,
} from './command/command.js';
export { CommandController } from './command/controller.js';
export type { SavedShortcut, ShortcutStore, UndoFrame, CommandControllerOptions } from './command/controller.js';
export { builtinCommands, installBuiltins } from './command/builtins.js';

// Display
export { LineGroup, BodyLines } from './display/lines.js';
export type { Line, LineGroupOptions, LineStyle, TerminalSize, Viewport } from './display/lines.js';
export { Screen } from './display/screen.js';
export type { RenderOptions, ScreenOptions, ScreenTarget } from './display/screen.js';
export { ScreenController } from './display/screen-controller.js';
export type { ScreenControllerOptions } from './display/screen-controller.js';
export { createPalette } from './display/style.js';
export type { Palette } from './display/style.js';

// Loop
export { ReadlinePrompter, ScriptedPrompter, askUntilValid, confirm, isAbort } from './loop/prompt.js';
export type { Prompter } from './loop/prompt.js';
export { ResizeWatcher } from './loop/resize-watcher.js';
export { RenderLoop, createStreamTerminal } from './loop/render-loop.js';
export type { Terminal, RenderLoopOptions } from './loop/render-loop.js';
