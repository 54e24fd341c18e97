/**
 * Exhaustiveness guard for `switch` over node kinds: adding a node type
 * without handling it becomes a compile error at the call site.
 */
export function assertNever(value: never, what: string): never {
    throw new Error(`Unhandled ${what}: ${JSON.stringify(value)}`);
}
