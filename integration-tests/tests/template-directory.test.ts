/**
 * Template Directory Tests
 *
 * The bundled templates are loaded from disk into the registry and used by a
 * config-mode run over a hand-laid page.
 */

import fs from 'fs';
import os from 'os';
import path from 'path';
import { clearTemplateRegistry, getTemplate, processDocument } from '@formsift/shared';
import {
  BUNDLED_TEMPLATE_DIR,
  loadTemplateDirectory,
  readTemplateDirectory,
} from '../../services/worker-extractor/src/lib/templates';
import { documentOf, line, page, settings } from './fixtures';

describe('Template directory', () => {
  afterEach(() => {
    clearTemplateRegistry();
  });

  it('should register the bundled templates', () => {
    expect(loadTemplateDirectory(BUNDLED_TEMPLATE_DIR)).toEqual(['personal-loan-v1']);
    expect(getTemplate('personal-loan-v1')?.identificationString).toBe('PERSONAL LOAN APPLICATION');
  });

  it('should skip files that fail validation', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'templates-'));
    try {
      fs.writeFileSync(path.join(dir, 'a-broken.json'), JSON.stringify({ formType: 'broken' }));
      fs.writeFileSync(path.join(dir, 'b-notes.txt'), 'not a template');
      fs.writeFileSync(
        path.join(dir, 'c-lease.json'),
        JSON.stringify({ formType: 'lease', identificationString: 'LEASE AGREEMENT' })
      );

      expect(readTemplateDirectory(dir).map((t) => t.formType)).toEqual(['lease']);
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  it('should extract a personal loan application with the bundled template', () => {
    loadTemplateDirectory(BUNDLED_TEMPLATE_DIR);
    const doc = documentOf(
      page([
        ...line(50, 10, 'PERSONAL', 'LOAN', 'APPLICATION'),
        ...line(100, 10, 'Surname', 'Smith', 'Forename', 'Jo'),
        ...line(130, 10, 'Tel', '555', '0100'),
        ...line(160, 10, 'Mr', 'X'),
      ])
    );

    const result = processDocument(doc, { mode: 'config', settings: settings() });

    expect(result.method).toBe('Config: personal-loan-v1');
    expect(result.records.map((r) => [r.key, r.value, r.method])).toEqual([
      ['Applicant Surname', 'Smith', 'Config Field'],
      ['Applicant Forename', 'Jo', 'Config Field'],
      ['Telephone', '555 0100', 'Config Field'],
      ['Title Mr', 'Checked', 'Config Checkbox'],
    ]);
    expect(result.warnings).toEqual([]);
  });
});
