import { describe, it, expect, vi, beforeEach } from 'vitest'
import mammoth from 'mammoth'
import { extractDocx } from './docx-extractor'
import { CorruptDocumentError } from '@/lib/errors'

vi.mock('mammoth', () => ({
  default: {
    extractRawText: vi.fn(),
  },
}))

describe('extractDocx', () => {
  beforeEach(() => {
    vi.mocked(mammoth.extractRawText).mockReset()
  })

  it('returns normalized text with a paragraph count', async () => {
    vi.mocked(mammoth.extractRawText).mockResolvedValue({
      value: 'MASTER SERVICES AGREEMENT\n\n1. Services\n\nCafé services are provided.\n\n',
      messages: [],
    })

    const result = await extractDocx(Buffer.from('docx'))

    expect(result.text).toBe(
      'MASTER SERVICES AGREEMENT\n\n1. Services\n\nCafé services are provided.\n\n'
    )
    expect(result.structure).toEqual({ format: 'docx', paragraphCount: 3 })
  })

  it('captures mammoth warnings and flags embedded images', async () => {
    vi.mocked(mammoth.extractRawText).mockResolvedValue({
      value: 'Text '.repeat(40),
      messages: [{ type: 'warning', message: 'Unrecognised image format' }],
    })

    const result = await extractDocx(Buffer.from('docx'))

    expect(result.quality.warnings.map((w) => w.type)).toEqual([
      'docx_warning',
      'embedded_images',
    ])
  })

  it('wraps parser failures in CorruptDocumentError', async () => {
    vi.mocked(mammoth.extractRawText).mockRejectedValue(new Error('End of data reached'))

    await expect(extractDocx(Buffer.from('bad'))).rejects.toBeInstanceOf(CorruptDocumentError)
  })
})
