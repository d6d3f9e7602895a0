import { TimeoutError } from "./errors.js"

/**
 * Race `operation` against a timer. The timer is always cleared so a
 * settled call leaves nothing scheduled.
 */
export async function withTimeout<T>(
    operation: () => Promise<T>,
    timeoutMs: number,
    label: string
): Promise<T> {
    let timer: ReturnType<typeof setTimeout> | undefined
    const timeout = new Promise<never>((_, reject) => {
        timer = setTimeout(() => {
            reject(new TimeoutError(label, timeoutMs))
        }, timeoutMs)
    })
    try {
        return await Promise.race([operation(), timeout])
    } finally {
        clearTimeout(timer)
    }
}
