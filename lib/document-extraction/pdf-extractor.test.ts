import { describe, it, expect, vi, beforeEach } from 'vitest'
import { extractText, getDocumentProxy, getMeta } from 'unpdf'
import { extractPdf } from './pdf-extractor'
import { CorruptDocumentError } from '@/lib/errors'

const destroy = vi.fn().mockResolvedValue(undefined)

vi.mock('unpdf', () => ({
  getDocumentProxy: vi.fn(),
  extractText: vi.fn(),
  getMeta: vi.fn(),
}))

type PdfProxy = Awaited<ReturnType<typeof getDocumentProxy>>
type ExtractTextResult = Awaited<ReturnType<typeof extractText>>
type MetaResult = Awaited<ReturnType<typeof getMeta>>

describe('extractPdf', () => {
  beforeEach(() => {
    vi.clearAllMocks()
    vi.mocked(getDocumentProxy).mockResolvedValue({ destroy } as unknown as PdfProxy)
    vi.mocked(getMeta).mockResolvedValue({
      info: { Title: 'Supply Agreement', Author: 'Legal' },
      metadata: null,
    } as unknown as MetaResult)
  })

  it('joins pages with blank lines and reads metadata', async () => {
    vi.mocked(extractText).mockResolvedValue({
      totalPages: 2,
      text: ['Page one text', 'Page two text'],
    } as unknown as ExtractTextResult)

    const result = await extractPdf(Buffer.from('%PDF'))

    expect(result.text).toBe('Page one text\n\nPage two text')
    expect(result.structure).toEqual({ format: 'pdf', pageCount: 2 })
    expect(result.metadata.title).toBe('Supply Agreement')
    expect(result.metadata.author).toBe('Legal')
    expect(destroy).toHaveBeenCalledTimes(1)
  })

  it('reports password-protected files as corrupt with a specific message', async () => {
    vi.mocked(getDocumentProxy).mockRejectedValue(new Error('No password given'))

    await expect(extractPdf(Buffer.from('%PDF'))).rejects.toThrow(
      'This PDF is password-protected. Remove the password and upload it again.'
    )
  })

  it('wraps other parser failures in CorruptDocumentError', async () => {
    vi.mocked(getDocumentProxy).mockRejectedValue(new Error('Invalid PDF structure'))

    await expect(extractPdf(Buffer.from('junk'))).rejects.toBeInstanceOf(CorruptDocumentError)
  })
})
