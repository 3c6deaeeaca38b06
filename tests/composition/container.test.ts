import { buildFileTools } from '../../src/composition/container';
import { FunctionToolRegistry } from '../../src/adapters/tools/FunctionToolRegistry';

describe('buildFileTools', () => {
  test('registers the six file tools in a fixed order', () => {
    const registry = new FunctionToolRegistry(buildFileTools('/tmp'));
    expect(registry.list().map((tool) => tool.name)).toEqual([
      'read_file',
      'list_files',
      'edit_file',
      'make_directory',
      'remove_directory',
      'rename_directory',
    ]);
  });

  test('every declaration is an object schema that lists only known properties as required', () => {
    for (const tool of buildFileTools('/tmp')) {
      expect(tool.schema.type).toBe('object');
      expect(tool.schema.additionalProperties).toBe(false);
      for (const name of tool.schema.required) {
        expect(Object.keys(tool.schema.properties)).toContain(name);
      }
      expect(tool.description.length).toBeGreaterThan(0);
    }
  });
});
