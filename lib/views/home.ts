import type { CurrentUser } from '../auth'
import { isAdmin } from '../roles'
import { layout } from './layout'
import { escapeHtml } from './render'

export function homePage(user: CurrentUser) {
  const adminLinks = isAdmin(user.role)
    ? `<li><a href="/classrooms/create">Add a classroom</a></li>`
    : ''
  return layout({
    title: 'Home',
    user,
    body: `<h1>Welcome, ${escapeHtml(user.userId)}</h1>
<p class="role">Signed in as ${escapeHtml(user.role)}</p>
<ul>
<li><a href="/classrooms">Browse classrooms</a></li>
${adminLinks}
</ul>`,
  })
}
