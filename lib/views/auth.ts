import { ROLE_VALUES } from '../roles'
import { errorBanner, layout } from './layout'

type FormState = {
  errorMessage?: string | null
}

export function registerPage({ errorMessage }: FormState = {}) {
  const roleOptions = ROLE_VALUES.map(role => `<option value="${role}">${role}</option>`).join('')
  return layout({
    title: 'Register',
    body: `<h1>Create an account</h1>
${errorBanner(errorMessage)}
<form method="post" action="/register">
<label>ID <input type="text" name="user_id" required /></label>
<label>Password <input type="password" name="password" required /></label>
<label>Role <select name="role">${roleOptions}</select></label>
<button type="submit">Register</button>
</form>
<p>Already registered? <a href="/login">Sign in</a></p>`,
  })
}

export function loginPage({ errorMessage }: FormState = {}) {
  return layout({
    title: 'Sign in',
    body: `<h1>Sign in</h1>
${errorBanner(errorMessage)}
<form method="post" action="/login">
<label>ID <input type="text" name="user_id" required /></label>
<label>Password <input type="password" name="password" required /></label>
<button type="submit">Sign in</button>
</form>
<p>No account yet? <a href="/register">Register</a></p>`,
  })
}
