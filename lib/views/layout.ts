import type { CurrentUser } from '../auth'
import { escapeHtml } from './render'

export const SITE_NAME = 'Classroom Booking'

type LayoutOptions = {
  title: string
  body: string
  user?: CurrentUser | null
}

function navBar(user?: CurrentUser | null) {
  if (!user) {
    return `<nav><a href="/login">Sign in</a> <a href="/register">Register</a></nav>`
  }
  return `<nav><a href="/">Home</a> <a href="/classrooms">Classrooms</a> <span class="nav-user">${escapeHtml(user.userId)} (${escapeHtml(user.role)})</span> <a href="/logout">Sign out</a></nav>`
}

export function layout({ title, body, user }: LayoutOptions) {
  return `<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="utf-8" />
<meta name="viewport" content="width=device-width, initial-scale=1" />
<title>${escapeHtml(title)} | ${SITE_NAME}</title>
</head>
<body>
${navBar(user)}
<main>
${body}
</main>
</body>
</html>
`
}

export function errorBanner(message?: string | null) {
  if (!message) return ''
  return `<p class="error" role="alert">${escapeHtml(message)}</p>`
}
