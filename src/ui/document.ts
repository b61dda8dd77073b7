import { escapeHtml } from '@/utils/format';

/**
 * Wrap rendered markup in a standalone page (tailwind from the CDN)
 */
export function renderDocument(title: string, body: string): string {
  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="utf-8">
  <meta name="viewport" content="width=device-width, initial-scale=1">
  <title>${escapeHtml(title)}</title>
  <script src="https://cdn.tailwindcss.com"></script>
</head>
<body class="min-h-screen bg-gray-950">
  <div class="max-w-5xl mx-auto px-4 py-6 space-y-6">
    <h1 class="text-xl font-semibold text-white">${escapeHtml(title)}</h1>${body}
  </div>
</body>
</html>
`;
}
