import {
  InvalidSelectionError,
  SerializationError,
  ServiceError,
  TransportError,
  toErrorMessage,
} from "../../shared/errors/assist-errors";

export class ErrorPresenter {
  present(error: unknown): string {
    if (error instanceof ServiceError) {
      const body = error.body.trim() || "(empty body)";
      return [
        `エラー: APIがステータス ${error.status} を返しました。`,
        `詳細: ${body}`,
      ].join("\n");
    }

    if (error instanceof TransportError) {
      const code = error.code ? ` [${error.code}]` : "";
      return `エラー: 通信に失敗しました${code}: ${error.message}`;
    }

    if (error instanceof InvalidSelectionError) {
      return [
        `エラー: ${error.message}`,
        "次のアクション: `--select <start>:<end>` を重ならないように指定してください。",
      ].join("\n");
    }

    if (error instanceof SerializationError) {
      return `エラー: リクエストを作成できませんでした: ${error.message}`;
    }

    return `アシスト実行中にエラーが発生しました: ${toErrorMessage(error)}`;
  }
}
