import t from "tap";
import { parseProgress } from "../src/progress.js";

t.test("parseProgress", async (t) => {
  t.equal(
    parseProgress("[download]  42.3% of 10.25MiB at 1.2MiB/s ETA 00:07"),
    42.3,
  );
  t.equal(parseProgress("[download] 100% of 3.20MiB in 00:01"), 100);
  t.equal(parseProgress(" 45%|████▌     | 45/100 [00:10<00:12]"), 45);
  t.equal(parseProgress("Transcribing: 7.5% | 3/40"), 7.5);
  t.equal(parseProgress("100%|██████████| 100.0/100.0"), 100);
  t.equal(parseProgress('[ExtractAudio] Destination: /tmp/w/talk.mp3'), null);
  t.equal(parseProgress('[Merger] Merging formats into "talk.mp4"'), null);
  t.equal(parseProgress("[download] Destination: /tmp/w/talk.webm"), undefined);
  t.equal(parseProgress("Detected language 'en' with probability 0.98"), undefined);
});
