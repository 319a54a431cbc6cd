import type { FragmentErrorKind } from '../src/errors'
import fs from 'node:fs'
import path from 'node:path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { FragmentError } from '../src/errors'
import { LineCounter } from '../src/format'
import { FragmentManager } from '../src/manager'
import { exists, makeTempDir, StaticHost, writeFile } from './helpers'

function expectKind(action: () => unknown, kind: FragmentErrorKind): void {
  let caught: unknown
  try {
    action()
  }
  catch (error) {
    caught = error
  }
  expect(caught).toBeInstanceOf(FragmentError)
  expect(caught instanceof FragmentError ? caught.kind : undefined).toBe(kind)
}

describe('FragmentManager', () => {
  let tempDir: string
  let root: string
  let host: StaticHost
  let manager: FragmentManager
  let available: string
  let enabled: string

  beforeEach(() => {
    tempDir = makeTempDir()
    root = path.join(tempDir, 'phpenv')
    host = new StaticHost(root, '8.3.4', ['8.2.17', '8.3.4'])
    manager = new FragmentManager(host, { systemVersion: 'system', linkMode: 'symlink' })
    available = path.join(root, 'versions', '8.3.4', 'etc', 'conf.d-available')
    enabled = path.join(root, 'versions', '8.3.4', 'etc', 'conf.d')
  })

  afterEach(() => {
    if (fs.existsSync(tempDir)) {
      fs.rmSync(tempDir, { recursive: true, force: true })
    }
  })

  it('resolves and lazily creates both directories', () => {
    expect(fs.existsSync(available)).toBe(false)
    expect(manager.paths()).toEqual({ root, version: '8.3.4', available, enabled })
    expect(fs.statSync(available).isDirectory()).toBe(true)
    expect(fs.statSync(enabled).isDirectory()).toBe(true)
  })

  describe('addConfig / addExtension', () => {
    it('stores a copy as cfg-<name>.ini, disabled', () => {
      const source = writeFile(path.join(tempDir, 'src', 'memory.ini'), 'memory_limit=512M\n')

      expect(manager.addConfig(source)).toBe('cfg-memory')
      expect(fs.readFileSync(path.join(available, 'cfg-memory.ini'), 'utf8')).toBe('memory_limit=512M\n')
      expect(manager.list()).toEqual({ enabled: [], disabled: ['cfg-memory'] })
    })

    it('stores extension files as ext-<name>.ini', () => {
      const source = writeFile(path.join(tempDir, 'src', 'redis.so.ini'), 'extension=redis.so\n')
      expect(manager.addExtension(source)).toBe('ext-redis')
      expect(exists(path.join(available, 'ext-redis.ini'))).toBe(true)
    })

    it('overwrites an existing fragment of the same name', () => {
      writeFile(path.join(available, 'cfg-memory.ini'), 'old\n')
      const source = writeFile(path.join(tempDir, 'memory.ini'), 'new\n')
      manager.addConfig(source)
      expect(fs.readFileSync(path.join(available, 'cfg-memory.ini'), 'utf8')).toBe('new\n')
    })

    it('rejects sources that are not files', () => {
      expectKind(() => manager.addConfig(path.join(tempDir, 'nope.ini')), 'InvalidSourcePath')
      expectKind(() => manager.addExtension(tempDir), 'InvalidSourcePath')
      expectKind(() => manager.addConfig(''), 'MissingArgument')
    })
  })

  describe('newExtension', () => {
    it('writes exactly one extension line', () => {
      expect(manager.newExtension('igbinary')).toBe('ext-igbinary')
      expect(fs.readFileSync(path.join(available, 'ext-igbinary.ini'), 'utf8')).toBe('extension=igbinary.so\n')
    })

    it('accepts the .so file name', () => {
      expect(manager.newExtension('apcu.so')).toBe('ext-apcu')
      expect(fs.readFileSync(path.join(available, 'ext-apcu.ini'), 'utf8')).toBe('extension=apcu.so\n')
    })

    it('overwrites an existing fragment', () => {
      writeFile(path.join(available, 'ext-igbinary.ini'), 'extension=other.so\n')
      manager.newExtension('igbinary')
      expect(fs.readFileSync(path.join(available, 'ext-igbinary.ini'), 'utf8')).toBe('extension=igbinary.so\n')
    })

    it('requires a name', () => {
      expectKind(() => manager.newExtension(''), 'MissingArgument')
    })

    it('rejects names containing a path separator', () => {
      expectKind(() => manager.newExtension('foo/bar'), 'InvalidName')
      expectKind(() => manager.newExtension('foo\\bar'), 'InvalidName')
      expect(fs.existsSync(available)).toBe(false)
    })
  })

  describe('enable', () => {
    it('links the enabled entry to the available file', () => {
      manager.newExtension('igbinary')
      expect(manager.enable('ext-igbinary')).toBe('ext-igbinary')

      const entry = path.join(enabled, 'ext-igbinary.ini')
      expect(fs.lstatSync(entry).isSymbolicLink()).toBe(true)
      expect(fs.readlinkSync(entry)).toBe(path.join(available, 'ext-igbinary.ini'))
      expect(manager.list()).toEqual({ enabled: ['ext-igbinary'], disabled: [] })
    })

    it('accepts the stored file name', () => {
      manager.newExtension('igbinary')
      expect(manager.enable('ext-igbinary.ini')).toBe('ext-igbinary')
    })

    it('fails a second time without touching the link', () => {
      manager.newExtension('igbinary')
      manager.enable('ext-igbinary')
      const entry = path.join(enabled, 'ext-igbinary.ini')
      const before = fs.lstatSync(entry)

      expectKind(() => manager.enable('ext-igbinary'), 'AlreadyEnabled')

      const after = fs.lstatSync(entry)
      expect(after.ino).toBe(before.ino)
      expect(fs.readlinkSync(entry)).toBe(path.join(available, 'ext-igbinary.ini'))
      expect(fs.readdirSync(enabled)).toEqual(['ext-igbinary.ini'])
    })

    it('fails for unknown fragments', () => {
      expectKind(() => manager.enable('ext-missing'), 'UnknownFragment')
      expect(fs.readdirSync(enabled)).toEqual([])
    })

    it('resolves an unprefixed name to its single match', () => {
      manager.newExtension('xdebug')
      expect(manager.enable('xdebug')).toBe('ext-xdebug')
    })

    it('refuses an unprefixed name matching both kinds', () => {
      manager.newExtension('opcache')
      writeFile(path.join(available, 'cfg-opcache.ini'), 'opcache.enable=1\n')
      expectKind(() => manager.enable('opcache'), 'AmbiguousFragment')
    })
  })

  describe('disable', () => {
    it('removes the link and keeps the available file', () => {
      manager.newExtension('igbinary')
      manager.enable('ext-igbinary')

      expect(manager.disable('ext-igbinary')).toEqual({ name: 'ext-igbinary', preserved: false })
      expect(exists(path.join(enabled, 'ext-igbinary.ini'))).toBe(false)
      expect(exists(path.join(available, 'ext-igbinary.ini'))).toBe(true)
      expect(manager.list()).toEqual({ enabled: [], disabled: ['ext-igbinary'] })
    })

    it('round-trips enable, disable, enable', () => {
      manager.newExtension('igbinary')
      manager.enable('ext-igbinary')
      manager.disable('ext-igbinary')
      manager.enable('ext-igbinary')

      const entry = path.join(enabled, 'ext-igbinary.ini')
      expect(fs.lstatSync(entry).isSymbolicLink()).toBe(true)
      expect(fs.readlinkSync(entry)).toBe(path.join(available, 'ext-igbinary.ini'))
    })

    it('moves a plain file without counterpart into the available store', () => {
      writeFile(path.join(enabled, 'cfg-local.ini'), 'date.timezone=UTC\n')
      expect(manager.list()).toEqual({ enabled: ['cfg-local'], disabled: [] })

      expect(manager.disable('cfg-local')).toEqual({ name: 'cfg-local', preserved: true })
      expect(exists(path.join(enabled, 'cfg-local.ini'))).toBe(false)
      expect(fs.readFileSync(path.join(available, 'cfg-local.ini'), 'utf8')).toBe('date.timezone=UTC\n')
    })

    it('deletes a plain file that has an available counterpart', () => {
      writeFile(path.join(available, 'cfg-local.ini'), 'date.timezone=UTC\n')
      writeFile(path.join(enabled, 'cfg-local.ini'), 'date.timezone=Europe/Paris\n')

      expect(manager.disable('cfg-local')).toEqual({ name: 'cfg-local', preserved: false })
      expect(exists(path.join(enabled, 'cfg-local.ini'))).toBe(false)
      expect(fs.readFileSync(path.join(available, 'cfg-local.ini'), 'utf8')).toBe('date.timezone=UTC\n')
    })

    it('fails when nothing is enabled under that name', () => {
      manager.newExtension('igbinary')
      expectKind(() => manager.disable('ext-igbinary'), 'UnknownFragment')
    })
  })

  describe('remove', () => {
    it('removes the available file and the link', () => {
      manager.newExtension('igbinary')
      manager.enable('ext-igbinary')

      expect(manager.remove('ext-igbinary')).toBe('ext-igbinary')
      expect(exists(path.join(available, 'ext-igbinary.ini'))).toBe(false)
      expect(exists(path.join(enabled, 'ext-igbinary.ini'))).toBe(false)
      expect(manager.list()).toEqual({ enabled: [], disabled: [] })
    })

    it('removes fragments that were never enabled', () => {
      manager.newExtension('igbinary')
      manager.remove('ext-igbinary')
      expect(fs.readdirSync(available)).toEqual([])
    })

    it('fails for unknown fragments', () => {
      expectKind(() => manager.remove('cfg-missing'), 'UnknownFragment')
    })
  })

  describe('list', () => {
    it('sorts both sequences', () => {
      for (const ext of ['zip', 'apcu', 'redis'])
        manager.newExtension(ext)
      writeFile(path.join(available, 'cfg-memory.ini'), 'memory_limit=1G\n')
      manager.enable('ext-zip')
      manager.enable('cfg-memory')

      expect(manager.list()).toEqual({
        enabled: ['cfg-memory', 'ext-zip'],
        disabled: ['ext-apcu', 'ext-redis'],
      })
    })

    it('ignores non-ini entries', () => {
      writeFile(path.join(available, 'notes.txt'), 'hello\n')
      expect(manager.list()).toEqual({ enabled: [], disabled: [] })
    })
  })

  describe('show', () => {
    it('annotates each line of the fragment', () => {
      writeFile(path.join(available, 'cfg-dev.ini'), 'display_errors=On\nerror_reporting=E_ALL\nlog_errors=Off\n')

      expect(manager.show('cfg-dev')).toEqual([
        '[cfg-dev:1] = display_errors=On',
        '[cfg-dev:2] = error_reporting=E_ALL',
        '[cfg-dev:3] = log_errors=Off',
      ])
    })

    it('continues numbering with a shared counter', () => {
      manager.newExtension('igbinary')
      manager.newExtension('redis')
      const counter = new LineCounter()

      expect(manager.show('ext-igbinary', counter)).toEqual(['[ext-igbinary:1] = extension=igbinary.so'])
      expect(manager.show('ext-redis', counter)).toEqual(['[ext-redis:2] = extension=redis.so'])
    })

    it('fails for unknown fragments', () => {
      expectKind(() => manager.show('cfg-missing'), 'UnknownFragment')
    })
  })

  describe('system version', () => {
    beforeEach(() => {
      host.version = 'system'
    })

    it('refuses every operation before touching the file system', () => {
      const source = writeFile(path.join(tempDir, 'memory.ini'), 'memory_limit=1G\n')

      expectKind(() => manager.addConfig(source), 'UnsupportedVersion')
      expectKind(() => manager.addExtension(source), 'UnsupportedVersion')
      expectKind(() => manager.newExtension('igbinary'), 'UnsupportedVersion')
      expectKind(() => manager.enable('ext-igbinary'), 'UnsupportedVersion')
      expectKind(() => manager.disable('ext-igbinary'), 'UnsupportedVersion')
      expectKind(() => manager.remove('ext-igbinary'), 'UnsupportedVersion')
      expectKind(() => manager.list(), 'UnsupportedVersion')
      expectKind(() => manager.show('ext-igbinary'), 'UnsupportedVersion')

      expect(fs.existsSync(root)).toBe(false)
    })
  })

  describe('copy link mode', () => {
    beforeEach(() => {
      manager = new FragmentManager(host, { systemVersion: 'system', linkMode: 'copy' })
    })

    it('enables by copying and disables by deleting the copy', () => {
      manager.newExtension('igbinary')
      manager.enable('ext-igbinary')

      const entry = path.join(enabled, 'ext-igbinary.ini')
      expect(fs.lstatSync(entry).isSymbolicLink()).toBe(false)
      expect(fs.readFileSync(entry, 'utf8')).toBe('extension=igbinary.so\n')

      expect(manager.disable('ext-igbinary')).toEqual({ name: 'ext-igbinary', preserved: false })
      expect(exists(entry)).toBe(false)
      expect(exists(path.join(available, 'ext-igbinary.ini'))).toBe(true)
    })
  })
})
