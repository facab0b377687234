export interface Complaint {
    id: string;             // "COMPLAINT_<txId>"
    docType: 'complaint';

    productId: string;
    consumer: string;       // Selected consumer of the product
    supplier: string;
    complainant: string;    // Whichever of the two filed it

    reason: string;
    decision: boolean;      // true = resolved in favour of the consumer
    resolved: boolean;

    createdAt: number;
    resolvedAt?: number;
}
