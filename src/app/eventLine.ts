import { chain, left, mapLeft, tryCatch, type Either } from 'fp-ts/Either';
import { pipe } from 'fp-ts/function';
import { PathReporter } from 'io-ts/PathReporter';
import type { ControllerEvent } from '@sinelab/signal-api';
import { ControllerEventCodec } from './codecs';

/** Decodes one line of the JSON-lines event stream. Blank lines are the shell's concern. */
export function decodeEventLine(line: string): Either<string, ControllerEvent> {
    return pipe(
        tryCatch(
            (): unknown => JSON.parse(line),
            error => `malformed JSON: ${error instanceof Error ? error.message : String(error)}`,
        ),
        chain(raw => pipe(
            ControllerEventCodec.decode(raw),
            mapLeft(errors => `invalid event: ${PathReporter.report(left(errors)).join('; ')}`),
        )),
    );
}
