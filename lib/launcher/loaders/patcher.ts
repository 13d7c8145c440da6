/**
 * @license MIT
 * @copyright Copyright (c) 2026, GoldFrite
 */

import type { FullConfig } from '../../../types/config'
import type { DataVariable, ProcessorStep, VersionDescriptor } from '../../../types/manifest'
import utils from '../../utils/utils'
import extractor from '../../utils/extractor'
import path_ from 'node:path'
import { spawn } from 'node:child_process'
import EventEmitter from '../../utils/events'
import type { PatcherEvents } from '../../../types/events'
import { KilnError, ErrorType } from '../../../types/errors'

/**
 * Run the processors of Forge-like installers. Processors run one after the other; each success
 * is saved in the version JSON, so an interrupted install resumes at the first processor that did
 * not succeed.
 */
export default class Patcher extends EventEmitter<PatcherEvents> {
  private readonly config: FullConfig
  private readonly javaPath: string

  /**
   * @param config The installer configuration.
   * @param javaPath The Java executable used to run the processors.
   */
  constructor(config: FullConfig, javaPath: string) {
    super()
    this.config = config
    this.javaPath = javaPath
  }

  /**
   * Run the processors of a version descriptor.
   * @param descriptor The merged version descriptor. The `success` flags of its processors are
   * updated in place.
   * @returns The number of processors that ran.
   */
  async patch(descriptor: VersionDescriptor) {
    const processors = descriptor.processors ?? []
    const data = descriptor.data ?? {}
    let amount = 0

    for (const [index, processor] of processors.entries()) {
      const filename = utils.getLibraryName(processor.jar)

      if (processor.sides && !processor.sides.includes('client')) {
        this.emit('patch_skip', { filename: filename, reason: 'side' })
        continue
      }
      if (processor.success) {
        this.emit('patch_skip', { filename: filename, reason: 'done' })
        continue
      }

      this.emit('patch_progress', { filename: filename, index: index })

      try {
        await this.run(processor, data)
      } catch (err) {
        await this.save(descriptor)
        throw err
      }

      processor.success = true
      await this.save(descriptor)
      amount++
    }

    this.emit('patch_end', { amount: amount })

    return amount
  }

  private async run(processor: ProcessorStep, data: Record<string, DataVariable>) {
    const jar = this.getLibraryFile(processor.jar)
    const classpath = [...processor.classpath.map((cp) => this.getLibraryFile(cp)), jar].join(path_.delimiter)
    const mainClass = this.getJarMain(jar)
    const args = processor.args.map((arg) => this.mapArg(arg, data))

    this.emit('patch_debug', `${mainClass} ${args.join(' ')}`)

    await new Promise<void>((resolve, reject) => {
      const patch = spawn(this.javaPath, ['-cp', classpath, mainClass, ...args])
      let stderr = ''

      patch.stdout.on('data', (chunk: Buffer) => this.emit('patch_debug', chunk.toString('utf8').replace(/\n$/, '')))
      patch.stderr.on('data', (chunk: Buffer) => {
        stderr += chunk.toString('utf8')
        this.emit('patch_debug', chunk.toString('utf8').replace(/\n$/, ''))
      })
      patch.on('error', (err) => {
        reject(new KilnError(ErrorType.PROCESSOR_ERROR, `Cannot run processor ${processor.jar}: ${err.message}`))
      })
      patch.on('close', (code) => {
        if (code === 0) return resolve()
        reject(new KilnError(ErrorType.PROCESSOR_ERROR, `Processor ${processor.jar} exited with code ${code}: ${stderr.trim()}`))
      })
    })
  }

  private async save(descriptor: VersionDescriptor) {
    const name = this.config.versionName
    await utils.writeJson(path_.join(this.config.root, 'versions', name, `${name}.json`), descriptor)
  }

  private getLibraryFile(coordinate: string) {
    return path_.join(this.config.root, 'libraries', utils.getLibraryPath(coordinate))
  }

  private getJarMain(jar: string) {
    const manifest = extractor.readFile(jar, 'META-INF/MANIFEST.MF')
    const match = manifest.match(/^Main-Class:\s*(\S+)\s*$/m)
    if (!match) {
      throw new KilnError(ErrorType.NOT_FOUND, `No Main-Class in the manifest of ${path_.basename(jar)}`)
    }
    return match[1]
  }

  /**
   * Resolve a processor argument:
   * - `{KEY}`: value of the data variable `KEY` (unknown keys are kept as is);
   * - `[group:artifact:version]`: absolute path of the library;
   * - `'literal'`: the literal, without quotes.
   */
  private mapArg(arg: string, data: Record<string, DataVariable>) {
    const variable = arg.match(/^\{(.+)\}$/)
    if (variable) {
      const value = data[variable[1]]
      if (!value) return arg
      return this.mapValue(value.client)
    }

    return this.mapValue(arg)
  }

  private mapValue(value: string) {
    const library = value.match(/^\[(.+)\]$/)
    if (library) return this.getLibraryFile(library[1])

    const literal = value.match(/^'(.*)'$/)
    if (literal) return literal[1]

    return value
  }
}
