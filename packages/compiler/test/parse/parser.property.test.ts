import { describe, it } from 'node:test'
import fc from 'fast-check'
import { FormKind } from '../../src/core/nodes.ts'
import { read } from '../helpers/compile.ts'
import { show } from '../helpers/forms.ts'

const atom = fc.stringMatching(/^[a-z_+<>=-][a-z0-9_]{0,6}$/)
const text = fc.stringMatching(/^[a-zA-Z ]{0,6}$/).map((value) => `"${value}"`)

const { list } = fc.letrec<{ form: string; list: string }>((tie) => ({
	form: fc.oneof({ depthSize: 'small', withCrossShrink: true }, atom, text, tie('list')),
	list: fc.array(tie('form'), { maxLength: 4 }).map((forms) => `(${forms.join(' ')})`),
}))

describe('parse/parser properties', () => {
	it('rendering the parsed forest gives back the source', () => {
		fc.assert(
			fc.property(fc.array(list, { maxLength: 3 }), (lists) => {
				const file = read(lists.join('\n'), { expand: false })
				return file.roots.map((root) => show(file, root)).join('\n') === lists.join('\n')
			})
		)
	})

	it('a single root spans every node', () => {
		fc.assert(
			fc.property(list, (source) => {
				const file = read(source, { expand: false })
				const root = file.roots[0]
				return root !== undefined && file.nodes.get(root).subtreeSize === file.nodes.count()
			})
		)
	})

	it('list payloads equal their child counts', () => {
		fc.assert(
			fc.property(list, (source) => {
				const file = read(source, { expand: false })
				return [...file.nodes].every(
					([id, node]) => node.kind !== FormKind.List || node.payload === file.nodes.children(id).length
				)
			})
		)
	})
})
