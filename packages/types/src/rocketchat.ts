/** ルーム作成者 */
export interface RoomCreator {
  id: string | null;
  username: string | null;
}

/**
 * ルーム (チャンネル)
 *
 * kind は upstream の `t` をそのまま保持する (c: channel, d: direct, p: private group)
 */
export interface Room {
  id: string | null;
  name: string | null;
  kind: string | null;
  creator: RoomCreator | null;
  topic: string | null;
  description: string | null;
  readOnly: boolean;
  isDefault: boolean;
  createdAt: Date | null;
  updatedAt: Date | null;
}

/** メッセージ送信者 */
export interface MessageAuthor {
  id: string | null;
  username: string | null;
  /** 表示名 */
  name: string | null;
}

/** メッセージ添付ファイル */
export interface MessageAttachment {
  title: string | null;
  type: string | null;
  description: string | null;
  link: string | null;
  linkIsDownload: boolean;
  imageUrl: string | null;
  imageType: string | null;
  imageSizeBytes: number | null;
}

/** メッセージ */
export interface Message {
  id: string | null;
  roomId: string | null;
  body: string | null;
  timestamp: Date | null;
  author: MessageAuthor | null;
  attachments: MessageAttachment[];
}

/** ログインしたアカウントのプロフィール */
export interface AccountProfile {
  id: string | null;
  username: string | null;
  name: string | null;
  email: string | null;
}

/** ログイン結果 */
export interface AuthResult {
  authToken: string;
  userId: string;
  me: AccountProfile | null;
}

/** エラーレスポンス */
export interface ApiErrorBody {
  error: string;
  message: string;
  details?: Record<string, unknown>;
}
