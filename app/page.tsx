import Link from "next/link";

export default function HomePage() {
  return (
    <section className="mx-auto grid w-full max-w-[1100px] gap-8">
      <div className="rounded-3xl border border-black/10 bg-white/90 p-8 shadow-sm">
        <p className="text-xs uppercase tracking-[0.35em] text-black/50">
          Crypto options chain
        </p>
        <h1 className="mt-4 text-4xl font-semibold text-ink md:text-5xl">
          Every strike at the nearest expiry, priced.
        </h1>
        <p className="mt-4 max-w-2xl text-base leading-relaxed text-black/70">
          Strikeboard pulls the live option catalog from Delta Exchange, keeps the contracts that
          settle next, and lays calls and puts side by side with mid or mark prices.
        </p>
        <div className="mt-6 flex flex-wrap gap-3 text-sm">
          <Link href="/chain" className="rounded-full bg-ember/10 px-4 py-2 text-ember">
            Open chain
          </Link>
          <span className="rounded-full bg-black/5 px-4 py-2 text-black/70">Mid or mark</span>
          <span className="rounded-full bg-black/5 px-4 py-2 text-black/70">
            Missing quotes stay blank
          </span>
        </div>
      </div>

      <div className="grid gap-4 md:grid-cols-3">
        {[
          {
            title: "Catalog",
            body: "Live call and put products, resolved from structured fields or their symbols."
          },
          {
            title: "Expiry",
            body: "Only contracts sharing the next future settlement time make the chain."
          },
          {
            title: "Quotes",
            body: "Tickers fetched concurrently; a slow or failed quote leaves its cell empty."
          }
        ].map((item) => (
          <div
            key={item.title}
            className="rounded-2xl border border-black/10 bg-white/80 p-6"
          >
            <h2 className="text-lg font-semibold text-ink">{item.title}</h2>
            <p className="mt-2 text-sm text-black/70">{item.body}</p>
          </div>
        ))}
      </div>
    </section>
  );
}
