import { describe, expect, test } from 'vitest';
import BindingTable from './binding-table';
import HierarchyManager from './hierarchy-manager';

/**
 * 1
 * └── 2
 *     ├── 3
 *     │   └── 4
 *     └── 5
 */
function createTree(): HierarchyManager {
	return new HierarchyManager()
		.setParent(2, 1)
		.setParent(3, 2)
		.setParent(4, 3)
		.setParent(5, 2);
}

describe('BindingTable', () => {
	test('descendants inherit the value attached to an ancestor', () => {
		const table = new BindingTable<string>(createTree());
		table.attach(1, 'root');

		expect(table.resolve(1)).toBe('root');
		expect(table.resolve(4)).toBe('root');
		expect(table.resolve(5)).toBe('root');
		expect(table.resolveOwner(4)).toBe(1);
	});

	test('nodes outside an owned subtree resolve to nothing', () => {
		const table = new BindingTable<string>(createTree());
		table.attach(3, 'branch');

		expect(table.resolve(4)).toBe('branch');
		expect(table.resolve(2)).toBeUndefined();
		expect(table.resolve(5)).toBeUndefined();
	});

	test('the nearest owner wins', () => {
		const table = new BindingTable<string>(createTree());
		table.attach(1, 'root');
		table.attach(3, 'branch');

		expect(table.resolve(2)).toBe('root');
		expect(table.resolve(4)).toBe('branch');
	});

	test('attaching above an owner does not override it', () => {
		const table = new BindingTable<string>(createTree());
		table.attach(3, 'branch');
		table.attach(1, 'root');

		expect(table.resolve(4)).toBe('branch');
		expect(table.resolve(5)).toBe('root');
	});

	test('detaching falls back to the nearest ancestor', () => {
		const table = new BindingTable<string>(createTree());
		table.attach(1, 'root');
		table.attach(3, 'branch');

		expect(table.detach(3)).toBe(true);
		expect(table.detach(3)).toBe(false);
		expect(table.resolve(4)).toBe('root');
	});

	test('inherit picks up the value at a new position', () => {
		const tree = createTree();
		const table = new BindingTable<string>(tree);
		table.attach(3, 'branch');
		table.attach(5, 'leaf');

		tree.setParent(6, 4);
		table.inherit(6);
		expect(table.resolve(6)).toBe('branch');

		tree.setParent(4, 5);
		table.inherit(4);
		expect(table.resolve(4)).toBe('leaf');
		expect(table.resolve(6)).toBe('leaf');
	});

	test('forget removes a node entirely', () => {
		const table = new BindingTable<string>(createTree());
		table.attach(4, 'own');
		table.forget(4);

		expect(table.getOwn(4)).toBeUndefined();
		expect(table.resolve(4)).toBeUndefined();
	});
});
