export interface Account {
    id: string;             // "ACCOUNT_<owner>"
    docType: 'account';
    owner: string;
    balance: number;
}

export function accountKey(owner: string): string {
    return `ACCOUNT_${owner}`;
}
