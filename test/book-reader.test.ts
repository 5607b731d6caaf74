/**
 * Tests for decoding TXT, FB2, FB2.ZIP and EPUB books.
 * Archives are assembled in memory; nothing outside the temp folder is read.
 */

import { after, describe, it } from 'node:test';
import assert from 'node:assert';
import fs from 'fs';
import os from 'os';
import path from 'path';
import zlib from 'zlib';
import {
  bookNameFromPath,
  decodeBook,
  detectFormat,
  extractEpubText,
  extractFb2Text,
  readBook
} from '../src/book-reader.js';
import { BookReadError, UnsupportedFormatError } from '../src/errors.js';
import { ZipReader } from '../src/zip-reader.js';

// "Привет мир" in windows-1251
const CP1251_FB2 = Buffer.concat([
  Buffer.from('<?xml version="1.0" encoding="windows-1251"?>\n<FictionBook><body><section><p>', 'ascii'),
  Buffer.from([0xcf, 0xf0, 0xe8, 0xe2, 0xe5, 0xf2, 0x20, 0xec, 0xe8, 0xf0]),
  Buffer.from('</p></section></body></FictionBook>', 'ascii')
]);

interface FakeEntry {
  name: string;
  content: string | Buffer;
  deflate?: boolean;
}

// Local headers, central directory and end record; CRCs are left at zero
function makeZip(entries: FakeEntry[]): Buffer {
  const locals: Buffer[] = [];
  const centrals: Buffer[] = [];
  let offset = 0;

  for (const entry of entries) {
    const name = Buffer.from(entry.name, 'utf8');
    const raw = typeof entry.content === 'string' ? Buffer.from(entry.content, 'utf8') : entry.content;
    const data = entry.deflate ? zlib.deflateRawSync(raw) : raw;
    const method = entry.deflate ? 8 : 0;

    const local = Buffer.alloc(30);
    local.writeUInt32LE(0x04034b50, 0);
    local.writeUInt16LE(20, 4);
    local.writeUInt16LE(method, 8);
    local.writeUInt32LE(data.length, 18);
    local.writeUInt32LE(raw.length, 22);
    local.writeUInt16LE(name.length, 26);
    locals.push(local, name, data);

    const central = Buffer.alloc(46);
    central.writeUInt32LE(0x02014b50, 0);
    central.writeUInt16LE(20, 4);
    central.writeUInt16LE(20, 6);
    central.writeUInt16LE(method, 10);
    central.writeUInt32LE(data.length, 20);
    central.writeUInt32LE(raw.length, 24);
    central.writeUInt16LE(name.length, 28);
    central.writeUInt32LE(offset, 42);
    centrals.push(central, name);

    offset += local.length + name.length + data.length;
  }

  const centralDir = Buffer.concat(centrals);
  const end = Buffer.alloc(22);
  end.writeUInt32LE(0x06054b50, 0);
  end.writeUInt16LE(entries.length, 8);
  end.writeUInt16LE(entries.length, 10);
  end.writeUInt32LE(centralDir.length, 12);
  end.writeUInt32LE(offset, 16);

  return Buffer.concat([...locals, centralDir, end]);
}

const FB2 = `<?xml version="1.0" encoding="utf-8"?>
<FictionBook xmlns="http://www.gribuser.ru/xml/fictionbook/2.0">
  <body>
    <section>
      <title><p>Chapter One</p></title>
      <p>First
         para.</p>
      <poem><stanza><v>Line one</v><v>Line two</v></stanza></poem>
      <p>   </p>
      <p>Last.</p>
    </section>
  </body>
</FictionBook>`;

const CONTAINER = `<?xml version="1.0"?>
<container version="1.0" xmlns="urn:oasis:names:tc:opendocument:xmlns:container">
  <rootfiles>
    <rootfile full-path="OEBPS/content.opf" media-type="application/oebps-package+xml"/>
  </rootfiles>
</container>`;

const OPF = `<?xml version="1.0"?>
<package xmlns="http://www.idpf.org/2007/opf" version="3.0">
  <manifest>
    <item id="ch2" href="text/ch2.xhtml" media-type="application/xhtml+xml"/>
    <item id="ch1" href="text/ch1.xhtml" media-type="application/xhtml+xml"/>
    <item id="css" href="style.css" media-type="text/css"/>
  </manifest>
  <spine>
    <itemref idref="ch1"/>
    <itemref idref="ch2"/>
  </spine>
</package>`;

function epubEntries(): FakeEntry[] {
  return [
    { name: 'mimetype', content: 'application/epub+zip' },
    { name: 'META-INF/container.xml', content: CONTAINER, deflate: true },
    { name: 'OEBPS/content.opf', content: OPF, deflate: true },
    { name: 'OEBPS/text/ch2.xhtml', content: '<html><body><p>Three.</p></body></html>', deflate: true },
    {
      name: 'OEBPS/text/ch1.xhtml',
      content: '<html><body><h1>Title</h1><p>One.</p><p>Two <i>words</i>.</p></body></html>',
      deflate: true
    },
    { name: 'OEBPS/style.css', content: 'p { margin: 0 }' }
  ];
}

describe('Book Reader', () => {

  describe('formats and names', () => {
    it('should detect formats from the extension', () => {
      assert.strictEqual(detectFormat('a.TXT'), 'txt');
      assert.strictEqual(detectFormat('b.fb2'), 'fb2');
      assert.strictEqual(detectFormat('b.fb2.zip'), 'fb2.zip');
      assert.strictEqual(detectFormat('c.zip'), 'fb2.zip');
      assert.strictEqual(detectFormat('d.epub'), 'epub');
      assert.strictEqual(detectFormat('e.pdf'), null);
    });

    it('should strip the book extension from the name', () => {
      assert.strictEqual(bookNameFromPath('/books/War and Peace.fb2.zip'), 'War and Peace');
      assert.strictEqual(bookNameFromPath('/books/book.txt'), 'book');
      assert.strictEqual(bookNameFromPath('noext'), 'noext');
    });
  });

  describe('ZipReader', () => {
    const zip = new ZipReader(makeZip([
      { name: 'stored.txt', content: 'plain' },
      { name: 'packed.txt', content: 'squeezed text', deflate: true }
    ]));

    it('should list entries', () => {
      assert.deepStrictEqual(zip.getEntryNames(), ['stored.txt', 'packed.txt']);
      assert.strictEqual(zip.has('packed.txt'), true);
      assert.strictEqual(zip.has('missing.txt'), false);
    });

    it('should read stored and deflated entries', () => {
      assert.strictEqual(zip.readText('stored.txt'), 'plain');
      assert.strictEqual(zip.readText('packed.txt'), 'squeezed text');
    });

    it('should throw for a missing entry', () => {
      assert.throws(() => zip.readEntry('missing.txt'), /Entry not found: missing.txt/);
    });

    it('should reject data that is not an archive', () => {
      assert.throws(() => new ZipReader(Buffer.from('not a zip at all, just some text')), /Not a ZIP archive/);
    });
  });

  describe('FB2', () => {
    it('should return paragraphs then verses separated by blank lines', () => {
      assert.strictEqual(
        extractFb2Text(FB2),
        'Chapter One\n\nFirst para.\n\nLast.\n\nLine one\n\nLine two'
      );
    });

    it('should read the first .fb2 file of an archive', () => {
      const archive = makeZip([
        { name: 'readme.txt', content: 'ignore me' },
        { name: 'book.fb2', content: FB2, deflate: true }
      ]);
      assert.strictEqual(decodeBook('fb2.zip', archive), extractFb2Text(FB2));
    });

    it('should decode UTF-8 bytes the same as text', () => {
      assert.strictEqual(extractFb2Text(Buffer.from(FB2, 'utf8')), extractFb2Text(FB2));
    });

    it('should decode bytes by the declared encoding', () => {
      assert.strictEqual(decodeBook('fb2', CP1251_FB2), 'Привет мир');
    });

    it('should decode an archived file by the declared encoding', () => {
      const archive = makeZip([{ name: 'book.fb2', content: CP1251_FB2, deflate: true }]);
      assert.strictEqual(decodeBook('fb2.zip', archive), 'Привет мир');
    });

    it('should fail for an archive without an .fb2 file', () => {
      const archive = makeZip([{ name: 'readme.txt', content: 'ignore me' }]);
      assert.throws(() => decodeBook('fb2.zip', archive), /no \.fb2 file/);
    });
  });

  describe('EPUB', () => {
    it('should follow the spine order', () => {
      const zip = new ZipReader(makeZip(epubEntries()));
      assert.strictEqual(extractEpubText(zip), 'One.\n\nTwo words.\n\nThree.');
    });

    it('should fall back to manifest order without a spine', () => {
      const entries = epubEntries().map((entry) =>
        entry.name === 'OEBPS/content.opf'
          ? { ...entry, content: OPF.replace(/<spine>[\s\S]*<\/spine>/, '') }
          : entry
      );
      const zip = new ZipReader(makeZip(entries));
      assert.strictEqual(extractEpubText(zip), 'Three.\n\nOne.\n\nTwo words.');
    });
  });

  describe('readBook', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'portioner-books-'));

    after(() => {
      fs.rmSync(dir, { recursive: true, force: true });
    });

    it('should read a text file', async () => {
      const file = path.join(dir, 'Short Story.txt');
      fs.writeFileSync(file, 'Once upon a time.', 'utf-8');

      const book = await readBook(file);
      assert.deepStrictEqual(book, { format: 'txt', name: 'Short Story', text: 'Once upon a time.' });
    });

    it('should read an epub file', async () => {
      const file = path.join(dir, 'novel.epub');
      fs.writeFileSync(file, makeZip(epubEntries()));

      const book = await readBook(file);
      assert.strictEqual(book.format, 'epub');
      assert.strictEqual(book.name, 'novel');
      assert.strictEqual(book.text, 'One.\n\nTwo words.\n\nThree.');
    });

    it('should reject unsupported formats', async () => {
      await assert.rejects(readBook(path.join(dir, 'book.pdf')), UnsupportedFormatError);
    });

    it('should wrap read failures in BookReadError', async () => {
      await assert.rejects(readBook(path.join(dir, 'missing.txt')), BookReadError);
    });

    it('should wrap decoding failures in BookReadError', async () => {
      const file = path.join(dir, 'broken.epub');
      fs.writeFileSync(file, 'definitely not an archive');

      await assert.rejects(readBook(file), (err: unknown) =>
        err instanceof BookReadError && err.filePath === file && /Not a ZIP archive/.test(err.message)
      );
    });
  });
});
