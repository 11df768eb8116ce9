import { setTimeout as sleep } from 'timers/promises'
import { PollTimeoutError } from './errors'

export interface PollOptions {
    intervalMs: number
    // 0 keeps polling until the condition holds
    maxAttempts: number
}

export const DEFAULT_POLL_OPTIONS: PollOptions = {
    intervalMs: 10_000,
    maxAttempts: 0,
}

// Calls `check` until it returns true, sleeping a fixed interval between attempts
export async function pollUntil( description: string, options: PollOptions, check: ( attempt: number ) => Promise<boolean> ): Promise<void> {
    for ( let attempt = 1; ; attempt++ ) {
        if ( await check( attempt ) ) {
            return
        }
        if ( options.maxAttempts > 0 && attempt >= options.maxAttempts ) {
            throw new PollTimeoutError( description, attempt )
        }
        await sleep( options.intervalMs )
    }
}
