import type { NextApiResponse } from 'next'

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
}

export function escapeHtml(value: string | number) {
  return String(value).replace(/[&<>"']/g, char => HTML_ESCAPES[char] ?? char)
}

export function renderPage(res: NextApiResponse, html: string, status = 200) {
  res.setHeader('Content-Type', 'text/html; charset=utf-8')
  res.status(status).send(html)
}
