export const ADMIN_CAP_ID = 'ADMINCAP';

export interface ProductCap {
    id: string;             // "PRODUCTCAP_<txId>"
    docType: 'productCap';
    productId: string;
    owner: string;          // Whoever may choose consumers and confirm orders
}

export interface AdminCap {
    id: typeof ADMIN_CAP_ID;
    docType: 'adminCap';
    owner: string;          // Arbitrator
    createdAt: number;
}
