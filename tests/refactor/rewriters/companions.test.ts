import { describe, it, expect } from 'vitest';
import { controllerNotes, testFileNotes } from '../../../src/refactor/rewriters/companions.js';
import { fixtureFile } from '../../helpers/project.js';

const serviceTest = fixtureFile('src/test/java/com/example/project/service/ProjectServiceTest.java');

describe('testFileNotes', () => {
  it('suggests test data for new fields', () => {
    expect(
      testFileNotes('ProjectServiceTest', serviceTest, [
        { action: 'add', field: { name: 'discount_rate', type: 'DECIMAL(5,2)', javaType: 'BigDecimal' } },
        { action: 'add', field: { name: 'code', type: 'VARCHAR(20)', javaType: 'String' } },
      ])
    ).toEqual([
      'ProjectServiceTest: add .discountRate(new BigDecimal("100.00")) to test data',
      'ProjectServiceTest: add .code("test_code") to test data',
    ]);
  });

  it('flags references to removed fields', () => {
    expect(
      testFileNotes('ProjectServiceTest', serviceTest, [
        { action: 'remove', fieldName: 'legacy_code' },
        { action: 'remove', fieldName: 'budget' },
      ])
    ).toEqual(['ProjectServiceTest: remove references to legacyCode']);
  });
});

describe('controllerNotes', () => {
  it('flags accessor calls of removed fields', () => {
    const content = 'public class ProjectController {\n    String code(Project p) { return p.getLegacyCode(); }\n}\n';

    expect(controllerNotes('ProjectController', content, [{ action: 'remove', fieldName: 'legacy_code' }])).toEqual([
      'ProjectController: still calls accessors of legacyCode',
    ]);
  });

  it('stays quiet for controllers that only pass DTOs through', () => {
    expect(
      controllerNotes('ProjectController', fixtureFile('src/main/java/com/example/project/controller/ProjectController.java'), [
        { action: 'remove', fieldName: 'legacy_code' },
      ])
    ).toEqual([]);
  });
});
