/**
 * An input line's tokens plus the set of tokens already claimed by a
 * validator. The underlying sequence is never mutated; claiming a token only
 * records its index, so iteration is never invalidated.
 */

export interface PendingToken {
    readonly index: number;
    readonly token: string;
}

export class TokenList {
    private readonly tokens: readonly string[];
    private readonly claimed = new Set<number>();

    constructor(tokens: readonly string[]) {
        this.tokens = [...tokens];
    }

    /** Unclaimed tokens in input order. */
    pending(): PendingToken[] {
        const result: PendingToken[] = [];
        this.tokens.forEach((token, index) => {
            if (!this.claimed.has(index)) {
                result.push({ index, token });
            }
        });
        return result;
    }

    /** Unclaimed token strings in input order. */
    remaining(): string[] {
        return this.pending().map(p => p.token);
    }

    get size(): number {
        return this.tokens.length - this.claimed.size;
    }

    isEmpty(): boolean {
        return this.size === 0;
    }

    /** First unclaimed token, without claiming it. */
    peek(): string | undefined {
        return this.pending()[0]?.token;
    }

    /** Claim and return the first unclaimed token. */
    shift(): string | undefined {
        const first = this.pending()[0];
        if (!first) return undefined;
        this.claimed.add(first.index);
        return first.token;
    }

    claim(indices: Iterable<number>): void {
        for (const index of indices) {
            if (index < 0 || index >= this.tokens.length) {
                throw new RangeError(`Token index out of range: ${index}`);
            }
            this.claimed.add(index);
        }
    }
}
