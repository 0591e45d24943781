export interface OnlineUser {
  userId: string;
  displayName: string;
}
