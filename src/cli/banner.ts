const ARTS = [
  String.raw`
     /\_/\
    ( o.o )
     > ^ <
    `,
  String.raw`
       __
     _(  )
    (____)
    `,
  String.raw`
     (\\\\)
     ( -_-)
     /|  |\
    `,
];

/**
 * Pick one of the start-up banners
 */
export function getRandomArt(random: () => number = Math.random): string {
  return ARTS[Math.min(Math.floor(random() * ARTS.length), ARTS.length - 1)];
}
