import { layout } from './layout'
import { escapeHtml } from './render'

const STATUS_TITLES: Record<number, string> = {
  400: 'Bad request',
  401: 'Sign in required',
  403: 'Forbidden',
  404: 'Not found',
  500: 'Server error',
}

export function errorPage({ status, message }: { status: number; message: string }) {
  const title = STATUS_TITLES[status] ?? 'Error'
  const signInLink = status === 401 ? `<p><a href="/login">Go to sign in</a></p>` : ''
  return layout({
    title,
    body: `<h1>${escapeHtml(title)}</h1>
<p class="error-detail">${escapeHtml(message)}</p>
${signInLink}`,
  })
}
