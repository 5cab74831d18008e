/** Authenticated broker session. Passed by reference to handlers that fetch candles. */
export interface KiteSession {
  apiKey: string;
  accessToken: string;
  userId: string;
  createdAt: string;
}
