import type { CurrentUser } from '../auth'
import { isAdmin } from '../roles'
import { EQUIPMENT_FLAGS, type Classroom, type EquipmentFlag } from '../stores/classrooms'
import { layout } from './layout'
import { escapeHtml } from './render'

const EQUIPMENT_LABELS: Record<EquipmentFlag, string> = {
  projector: 'Projector',
  whiteboard: 'Whiteboard',
}

function equipmentList(room: Classroom) {
  const items = EQUIPMENT_FLAGS
    .filter(flag => room.equipment[flag])
    .map(flag => `<li data-equipment="${flag}">${EQUIPMENT_LABELS[flag]}</li>`)
  return items.length ? `<ul class="equipment">${items.join('')}</ul>` : '<span class="equipment-none">None</span>'
}

function classroomRow(room: Classroom, admin: boolean) {
  const actions = admin
    ? `<td class="actions"><a href="/classrooms/${room.id}/edit">Edit</a> <form method="post" action="/classrooms/${room.id}/delete"><button type="submit">Delete</button></form></td>`
    : ''
  return `<tr data-classroom-id="${room.id}"><td class="classroom-name">${escapeHtml(room.name)}</td><td class="classroom-location">${escapeHtml(room.location)}</td><td class="classroom-capacity">${room.capacity}</td><td>${equipmentList(room)}</td>${actions}</tr>`
}

export function classroomListPage({ classrooms, user }: { classrooms: Classroom[]; user: CurrentUser }) {
  const admin = isAdmin(user.role)
  const rows = classrooms.map(room => classroomRow(room, admin)).join('\n')
  const table = classrooms.length
    ? `<table>
<thead><tr><th>Name</th><th>Location</th><th>Capacity</th><th>Equipment</th>${admin ? '<th></th>' : ''}</tr></thead>
<tbody>
${rows}
</tbody>
</table>`
    : '<p class="empty">No classrooms yet.</p>'
  return layout({
    title: 'Classrooms',
    user,
    body: `<h1>Classrooms</h1>
${admin ? '<p><a href="/classrooms/create">Add a classroom</a></p>' : ''}
${table}`,
  })
}

type ClassroomFormOptions =
  | { mode: 'create'; user: CurrentUser }
  | { mode: 'edit'; user: CurrentUser; classroom: Classroom }

export function classroomFormPage(options: ClassroomFormOptions) {
  const room = options.mode === 'edit' ? options.classroom : null
  const action = room ? `/classrooms/${room.id}/edit` : '/classrooms/create'
  const heading = room ? `Edit ${escapeHtml(room.name)}` : 'New classroom'
  const checkbox = (flag: EquipmentFlag) => {
    const checked = room?.equipment[flag] ? ' checked' : ''
    return `<label><input type="checkbox" name="${flag}" value="true"${checked} /> ${EQUIPMENT_LABELS[flag]}</label>`
  }
  return layout({
    title: room ? 'Edit classroom' : 'New classroom',
    user: options.user,
    body: `<h1>${heading}</h1>
<form method="post" action="${action}" data-mode="${options.mode}">
<label>Name <input type="text" name="name" value="${room ? escapeHtml(room.name) : ''}" required /></label>
<label>Location <input type="text" name="location" value="${room ? escapeHtml(room.location) : ''}" required /></label>
<label>Capacity <input type="number" name="capacity" value="${room ? room.capacity : ''}" required /></label>
${EQUIPMENT_FLAGS.map(checkbox).join('\n')}
<button type="submit">${room ? 'Save changes' : 'Create'}</button>
</form>
<p><a href="/classrooms">Back to classrooms</a></p>`,
  })
}
