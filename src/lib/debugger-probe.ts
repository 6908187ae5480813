import inspector from 'node:inspector';

/** True when a debugger is attached; time limits are then ignored. */
export type DebuggerProbe = () => boolean;

export const detectDebugger: DebuggerProbe = () => inspector.url() !== undefined;

export const noDebugger: DebuggerProbe = () => false;
