export interface SessionInfo {
  token: string;
  username: string;
  isAdmin: boolean;
  expiresAt: string;               // ISO 8601
}

export interface ConfirmationTicket {
  token: string;
  action: 'reset-transactions';
  expiresAt: string;
}
