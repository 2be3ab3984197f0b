import { StringDecoder } from 'string_decoder';

/**
 * Split a chunked response body into lines without the trailing newline.
 * Multi-byte characters split across chunks are reassembled.
 */
export async function* readLines(
  body: AsyncIterable<string | Buffer>
): AsyncGenerator<string, void, undefined> {
  const decoder = new StringDecoder('utf8');
  let buffered = '';

  for await (const chunk of body) {
    buffered += typeof chunk === 'string' ? chunk : decoder.write(chunk);

    let newline = buffered.indexOf('\n');
    while (newline !== -1) {
      yield stripCarriageReturn(buffered.slice(0, newline));
      buffered = buffered.slice(newline + 1);
      newline = buffered.indexOf('\n');
    }
  }

  buffered += decoder.end();
  if (buffered.length > 0) {
    yield stripCarriageReturn(buffered);
  }
}

function stripCarriageReturn(line: string): string {
  return line.endsWith('\r') ? line.slice(0, -1) : line;
}
