// ============================================================================
// Configuration
// ============================================================================

export type HttpServiceConfig = {
    readonly baseUrl: string;
    readonly timeoutMs: number;
}

export type ReceiptConfig = {
    /** Currency symbol printed in front of every amount. */
    readonly currency: string;
}

export type ProductionConfig = {
    readonly catalog: HttpServiceConfig;
    readonly pricing: HttpServiceConfig;
    readonly receipts: ReceiptConfig;
}
