export class AppError extends Error {
    status: number;
    code: string | undefined;
    constructor(message: string, status = 400, code?: string) {
        super(message);
        this.status = status;
        this.code = code;
    }
}

export type UntisErrorKind = 'bad-credentials' | 'not-authorized' | 'network' | 'unknown';

const NETWORK_CODES = new Set(['ECONNREFUSED', 'ECONNRESET', 'ENOTFOUND', 'ETIMEDOUT', 'EAI_AGAIN', 'ECONNABORTED']);

/**
 * The WebUntis client reports everything as plain errors, so failures are
 * told apart by message and errno code.
 */
export function classifyError(e: unknown): UntisErrorKind {
    if (!(e instanceof Error)) return 'unknown';
    const message = e.message.toLowerCase();

    if (message.includes('bad credentials')) return 'bad-credentials';
    if (message.includes('no right')) return 'not-authorized';

    const code = 'code' in e && typeof e.code === 'string' ? e.code : undefined;
    if ((code && NETWORK_CODES.has(code)) || message.includes('network error') || message.includes('timeout')) {
        return 'network';
    }
    return 'unknown';
}
