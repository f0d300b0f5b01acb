export interface TextBlock {
  type: "TextBlock";
  text: string;
  weight?: "bolder";
  size?: "medium";
  wrap?: boolean;
}

export interface AdaptiveCardMessage {
  type: "message";
  attachments: Array<{
    contentType: "application/vnd.microsoft.card.adaptive";
    contentUrl: null;
    content: {
      $schema: string;
      type: "AdaptiveCard";
      version: "1.4";
      body: TextBlock[];
    };
  }>;
}

/** Wrap a title and body into the single-card message an incoming webhook accepts */
export function fmtAdaptiveCard(title: string, body: string): AdaptiveCardMessage {
  return {
    type: "message",
    attachments: [
      {
        contentType: "application/vnd.microsoft.card.adaptive",
        contentUrl: null,
        content: {
          $schema: "http://adaptivecards.io/schemas/adaptive-card.json",
          type: "AdaptiveCard",
          version: "1.4",
          body: [
            { type: "TextBlock", text: title, weight: "bolder", size: "medium" },
            { type: "TextBlock", text: body, wrap: true },
          ],
        },
      },
    ],
  };
}

/** Card title for the action items of one audio file */
export function fmtActionItemsTitle(audioFileName: string): string {
  return `Action Items from: ${audioFileName}`;
}
