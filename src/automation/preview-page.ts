const HTML_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;",
};

export function escapeHtml(text: string): string {
  return text.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}

export interface PreviewStyle {
  color: "blue" | "red";
  borderRadius: "50%" | "0";
  spinDuration: "1s" | "3s";
}

/** Keyword-driven look of the preview shape. */
export function previewStyleFor(script: string): PreviewStyle {
  const lower = script.toLowerCase();
  return {
    color: lower.includes("blue") ? "blue" : "red",
    borderRadius: lower.includes("circle") ? "50%" : "0",
    spinDuration: lower.includes("fast") ? "1s" : "3s",
  };
}

/** Standalone HTML page that stands in for a WebGL build of the script. */
export function renderPreviewPage(script: string): string {
  const style = previewStyleFor(script);
  const safe = escapeHtml(script);
  return `<!DOCTYPE html>
<html>
<head>
  <meta charset="utf-8">
  <title>${safe}</title>
  <style>
    body {
      margin: 0;
      height: 100vh;
      display: flex;
      align-items: center;
      justify-content: center;
      background: linear-gradient(135deg, #1a1a1a, #444);
      color: white;
      font-family: Arial, sans-serif;
    }
    .shape {
      width: 100px;
      height: 100px;
      background: ${style.color};
      border-radius: ${style.borderRadius};
      animation: spin ${style.spinDuration} linear infinite;
    }
    @keyframes spin {
      0% { transform: rotate(0deg); }
      100% { transform: rotate(360deg); }
    }
  </style>
</head>
<body>
  <div>
    <h2>Game Preview</h2>
    <div class="shape"></div>
    <pre>${safe}</pre>
  </div>
</body>
</html>
`;
}
