/** First 100 fractional digits of pi. */
export const PI_DIGITS =
  "1415926535897932384626433832795028841971693993751058209749445923078164062862089986280348253421170679";
