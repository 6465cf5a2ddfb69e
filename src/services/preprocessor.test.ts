import { describe, it, expect } from 'vitest';
import path from 'path';
import { Preprocessor } from './preprocessor.js';
import { makeTree, silentLogger } from '../test-support/fixtures.js';

describe('Preprocessor', () => {
  it('expands Apache includes recursively', async () => {
    const root = await makeTree({
      'parts/header.js': 'var header = 1;\n<!--#include file="footer.js" -->',
      'parts/footer.js': 'var footer = 2;',
    });
    const preprocessor = new Preprocessor(silentLogger());

    const output = await preprocessor.expandApacheImports(
      'start();\n<!--#include file="parts/header.js" -->\nend();',
      path.join(root, 'main.js')
    );

    expect(output).toBe('start();\nvar header = 1;\nvar footer = 2;\nend();');
  });

  it('keeps an include whose file is missing and logs it', async () => {
    const root = await makeTree({});
    const logger = silentLogger();
    const directive = '<!--#include file="gone.js" -->';

    const output = await new Preprocessor(logger).expandApacheImports(directive, path.join(root, 'main.js'));

    expect(output).toBe(directive);
    expect(logger.getMessages()).toEqual([`Include file ${path.join(root, 'gone.js')} not found`]);
  });

  it('leaves a file including itself unexpanded', async () => {
    const root = await makeTree({ 'a.js': 'var a = 1;\n<!--#include file="a.js" -->' });
    const file = path.join(root, 'a.js');
    const logger = silentLogger();

    const output = await new Preprocessor(logger).expandApacheImports('var a = 1;\n<!--#include file="a.js" -->', file);

    expect(output).toBe('var a = 1;\n<!--#include file="a.js" -->');
    expect(logger.getMessages()).toEqual([`Recursive include of ${file} skipped`]);
  });

  it('expands a file included twice side by side', async () => {
    const root = await makeTree({ 'part.js': 'x();' });

    const output = await new Preprocessor(silentLogger()).expandApacheImports(
      '<!--#include file="part.js" -->\n<!--#include file="part.js" -->',
      path.join(root, 'main.js')
    );

    expect(output).toBe('x();\nx();');
  });

  it('stops at stylesheets importing each other', async () => {
    const root = await makeTree({
      'css/a.css': '@import "b.css";\n.a {}',
      'css/b.css': '@import "a.css";\n.b {}',
    });
    const logger = silentLogger();

    const output = await new Preprocessor(logger).expandCssImports(
      '@import "b.css";\n.a {}',
      path.join(root, 'css', 'a.css')
    );

    expect(output).toBe('@import "a.css";\n.b {}\n.a {}');
    expect(logger.getMessages()).toEqual([`Recursive import of ${path.join(root, 'css', 'a.css')} skipped`]);
  });

  it('inlines local CSS imports and rebases their urls', async () => {
    const root = await makeTree({
      'css/vendor/grid.css': '.grid { background: url(img/bg.png); }',
    });

    const output = await new Preprocessor(silentLogger()).expandCssImports(
      '@import url("vendor/grid.css");\n@import "https://cdn.example.com/reset.css";\nbody { margin: 0; }',
      path.join(root, 'css', 'site.css')
    );

    expect(output).toBe(
      '.grid { background: url(vendor/img/bg.png); }\n@import "https://cdn.example.com/reset.css";\nbody { margin: 0; }'
    );
  });

  it('minifies scripts and stylesheets', async () => {
    const preprocessor = new Preprocessor(silentLogger());

    expect((await preprocessor.compressJs('const answer = 42;\n', '/srv/app.js')).trim()).toBe('const answer=42;');
    expect((await preprocessor.compressCss('a {\n  color: red;\n}\n', '/srv/site.css')).trim()).toBe('a{color:red}');
  });

  it('returns the original content when minification fails', async () => {
    const logger = silentLogger();
    const broken = 'function (';

    expect(await new Preprocessor(logger).compressJs(broken, '/srv/broken.js')).toBe(broken);
    expect(logger.getEntries()[0].message.startsWith('Unable to minify /srv/broken.js: ')).toBe(true);
  });
});
