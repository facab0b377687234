export interface Consumer {
    id: string;             // "CONSUMER_<txId>"
    docType: 'consumer';

    productId: string;      // Product this bid targets
    bidder: string;         // Client identity of the creator

    description: string;
    requirements: string[]; // Ordered, no duplicates, e.g. ["high_quality"]
    createdAt: number;
}
