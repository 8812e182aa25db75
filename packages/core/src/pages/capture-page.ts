const HTML_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;",
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}

export interface CapturePageModel {
  token: string;
  ticket: string;
  destinationUrl: string;
  label: string;
}

export function capturePath(token: string): string {
  return `/p/${encodeURIComponent(token)}`;
}

/**
 * Consent page for a link. Nothing is taken until the visitor picks a photo
 * and submits; the skip link goes straight to the destination.
 */
export function renderCapturePage(model: CapturePageModel): string {
  const action = escapeHtml(`${capturePath(model.token)}/capture`);
  const destination = escapeHtml(model.destinationUrl);
  const host = escapeHtml(safeHost(model.destinationUrl));
  return `<!doctype html>
<html lang="en">
  <head>
    <meta charset="utf-8" />
    <meta name="viewport" content="width=device-width, initial-scale=1" />
    <meta name="robots" content="noindex" />
    <title>${escapeHtml(model.label)}</title>
    <style>
      body { margin: 0; font-family: system-ui, -apple-system, Segoe UI, Roboto, Arial, sans-serif; background: #f5f5f4; color: #1c1917; }
      .wrap { max-width: 28rem; margin: 10vh auto; padding: 24px; background: #fff; border-radius: 16px; box-shadow: 0 8px 30px rgba(0,0,0,0.08); }
      h1 { font-size: 20px; margin: 0 0 12px 0; }
      p { line-height: 1.5; margin: 0 0 16px 0; }
      input[type="file"] { display: block; margin: 0 0 16px 0; }
      button { width: 100%; padding: 12px; font-size: 16px; border: 0; border-radius: 10px; background: #1c1917; color: #fff; }
      .skip { display: block; margin-top: 16px; text-align: center; color: #57534e; }
    </style>
  </head>
  <body>
    <main class="wrap">
      <h1>${escapeHtml(model.label)}</h1>
      <p>The owner of this link asks for a photo before you continue to <strong>${host}</strong>.
        If you send one, it is stored with the link owner's storage provider. No other information is collected.</p>
      <form method="post" action="${action}" enctype="multipart/form-data">
        <input type="hidden" name="ticket" value="${escapeHtml(model.ticket)}" />
        <label for="photo">Photo</label>
        <input id="photo" type="file" name="photo" accept="image/*" capture="user" required />
        <button type="submit">Send photo and continue</button>
      </form>
      <a class="skip" href="${destination}">Skip and continue</a>
    </main>
  </body>
</html>
`;
}

export function renderNotFoundPage(): string {
  return "Link not found";
}

function safeHost(url: string): string {
  try {
    return new URL(url).host;
  } catch {
    return url;
  }
}
