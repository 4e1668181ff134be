import test from 'node:test';
import assert from 'node:assert/strict';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { ConsoleSpeaker, PiperSpeaker, sanitizeSpeechText, speechDuration } from '../src/speech';
import { createRecordingLogger } from './helpers/recording_logger';

test('speech text is flattened to one quote-free line', () => {
    assert.equal(sanitizeSpeechText('He said "hi"\nthen\r\nleft'), 'He said hi then left');
});

test('speech duration is length over rate plus the tail', () => {
    assert.equal(speechDuration('abcdefghijkl', 12, 1.5), 2.5);
    assert.equal(speechDuration('', 12, 1.5), 1.5);
});

test('the console speaker prints a tagged line', async () => {
    const lines: string[] = [];
    await new ConsoleSpeaker((l) => lines.push(l)).say('Hello there');
    assert.deepEqual(lines, ['[SPEAK] Hello there']);
});

test('a missing piper binary is logged and the promise still resolves', async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'speech-'));
    try {
        const logger = createRecordingLogger();
        const speaker = new PiperSpeaker({
            binPath: path.join(dir, 'no-such-piper'),
            modelPath: path.join(dir, 'voice.onnx'),
            outputFile: path.join(dir, 'out.wav'),
            logger,
        });
        await speaker.say('Hello');
        const errors = logger.entries.filter((e) => e.level === 'error');
        assert.equal(errors.length, 1);
        assert.ok(errors[0].msg.startsWith('Piper error: spawn '));
    } finally {
        fs.rmSync(dir, { recursive: true, force: true });
    }
});

test('blank text never starts piper', async () => {
    const logger = createRecordingLogger();
    const speaker = new PiperSpeaker({ binPath: '/nonexistent/piper', modelPath: 'm', outputFile: 'o.wav', logger });
    await speaker.say(' "" \n');
    assert.deepEqual(logger.entries, []);
});
